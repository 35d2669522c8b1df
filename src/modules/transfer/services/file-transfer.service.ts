import { Injectable, Logger } from '@nestjs/common';
import { SshCommandService } from '../../shared/services';
import { PushFileDto } from '../dto/push-file.dto';
import { PushOptions, TransferResult } from '../interfaces';
import { ChunkedFilePusherService } from './chunked-file-pusher.service';

/**
 * File Transfer Service
 * Pushes a local file to a host over its own SSH channel
 */
@Injectable()
export class FileTransferService {
  private readonly logger = new Logger(FileTransferService.name);

  constructor(
    private readonly sshCommandService: SshCommandService,
    private readonly chunkedFilePusher: ChunkedFilePusherService,
  ) {}

  /**
   * Open a channel, push the file, and close the channel again
   */
  async pushToHost(
    dto: PushFileDto,
    options: Omit<PushOptions, 'blockSize'> = {},
  ): Promise<TransferResult> {
    const channel = await this.sshCommandService.openChannel({
      host: dto.target.host,
      port: dto.target.port,
      username: dto.target.username,
      password: dto.target.password,
      privateKey: dto.target.privateKey,
    });

    try {
      return await this.chunkedFilePusher.push(
        {
          sourcePath: dto.sourcePath,
          destinationPath: dto.destinationPath,
          remoteTarget: channel,
        },
        { ...options, blockSize: dto.blockSize },
      );
    } finally {
      await channel.close();
      this.logger.debug(`[${dto.target.host}] Channel closed`);
    }
  }
}
