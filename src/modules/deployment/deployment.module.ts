import { DynamicModule, Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { TransferModule } from '../transfer/transfer.module';
import { CLOUD_PROVIDER_CLIENT, CloudProviderClient } from './interfaces';
import { DeploymentService } from './services/deployment.service';

export interface DeploymentModuleOptions {
  /** Binding to the cloud provider's management API */
  provider: CloudProviderClient;
}

/**
 * Deployment Module
 * Two-tier provisioning workflow:
 * - Affinity group and virtual network site
 * - Front-end web server
 * - Back-end database server on the same subnet
 */
@Module({})
export class DeploymentModule {
  static register(options: DeploymentModuleOptions): DynamicModule {
    return {
      module: DeploymentModule,
      imports: [SharedModule, TransferModule],
      providers: [
        { provide: CLOUD_PROVIDER_CLIENT, useValue: options.provider },
        DeploymentService,
      ],
      exports: [DeploymentService],
    };
  }
}
