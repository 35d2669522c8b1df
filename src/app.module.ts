import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SharedModule } from './modules/shared/shared.module';
import { TransferModule } from './modules/transfer/transfer.module';
import configuration from './config/configuration';

/**
 * Root Application Module
 * Used by the CLI as a standalone application context.
 * DeploymentModule is registered by whoever supplies a cloud provider binding.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      cache: true,
      expandVariables: true,
    }),
    SharedModule,
    TransferModule,
  ],
})
export class AppModule {}
