import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { ChunkedFilePusherService } from './services/chunked-file-pusher.service';
import { FileTransferService } from './services/file-transfer.service';
import {
  LoggerProgressReporter,
  PROGRESS_REPORTER,
} from './services/progress-reporter.service';

/**
 * Transfer Module
 * Chunked file push over a remote channel, with progress logging
 */
@Module({
  imports: [SharedModule],
  providers: [
    ChunkedFilePusherService,
    FileTransferService,
    { provide: PROGRESS_REPORTER, useClass: LoggerProgressReporter },
  ],
  exports: [ChunkedFilePusherService, FileTransferService],
})
export class TransferModule {}
