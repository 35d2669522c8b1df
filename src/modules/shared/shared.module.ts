import { Module } from '@nestjs/common';
import { SshCommandService } from './services/ssh-command.service';

/**
 * Shared Module
 * SSH connectivity used by the transfer and deployment modules
 */
@Module({
  providers: [SshCommandService],
  exports: [SshCommandService],
})
export class SharedModule {}
