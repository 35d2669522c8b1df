import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProgressReporter, ProgressUpdate } from '../interfaces';

/** Injection token for the module-wide progress sink */
export const PROGRESS_REPORTER = Symbol('PROGRESS_REPORTER');

/**
 * Logs transfer progress through the Nest logger.
 * Throttled per activity; the first and the final update are always logged.
 */
@Injectable()
export class LoggerProgressReporter implements ProgressReporter {
  private readonly logger = new Logger('TransferProgress');
  private readonly lastLogged = new Map<string, number>();

  constructor(private readonly configService: ConfigService) {}

  report(update: ProgressUpdate): void {
    const now = Date.now();
    const last = this.lastLogged.get(update.activity);
    const done = update.percentComplete >= 100;

    if (!done && last !== undefined && now - last < this.interval()) {
      return;
    }

    const sentMB = update.bytesSent / (1024 * 1024);
    const totalMB = update.totalBytes / (1024 * 1024);
    this.logger.log(
      `📊 ${update.activity} | ${update.status} | ${update.percentComplete.toFixed(1)}% | ${sentMB.toFixed(2)}/${totalMB.toFixed(2)} MB`,
    );

    if (done) {
      this.lastLogged.delete(update.activity);
    } else {
      this.lastLogged.set(update.activity, now);
    }
  }

  private interval(): number {
    return this.configService.get<number>('transfer.progressInterval') ?? 5000;
  }
}
