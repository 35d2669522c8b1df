import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { FileHandle } from 'fs/promises';
import * as path from 'path';
import { RemoteChannelError } from '../../shared/errors';
import {
  RemoteChannel,
  RemoteCommandResult,
  RemoteOperation,
} from '../../shared/interfaces';
import {
  LocalSourceError,
  RemotePrepError,
  RemoteWriteError,
  TransferAbortedError,
  VerificationError,
} from '../errors';
import {
  ProgressReporter,
  ProgressUpdate,
  PushOptions,
  RemoteFileInfo,
  TransferRequest,
  TransferResult,
} from '../interfaces';
import { PROGRESS_REPORTER } from './progress-reporter.service';
import {
  APPEND_CHUNK,
  ENSURE_PARENT_DIRECTORY,
  REMOVE_FILE,
  STAT_FILE,
  STAT_MISSING_EXIT_CODE,
  TOUCH_FILE,
  parseStatOutput,
} from './remote-file.operations';

export const DEFAULT_BLOCK_SIZE = 1024 * 1024;

/**
 * Chunked File Pusher
 * Rebuilds a local file on a remote host by appending fixed-size blocks,
 * one remote invocation per block, strictly in order.
 */
@Injectable()
export class ChunkedFilePusherService {
  private readonly logger = new Logger(ChunkedFilePusherService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(PROGRESS_REPORTER)
    private readonly progressReporter: ProgressReporter,
  ) {}

  /**
   * Push the source file to the destination, replacing whatever is there.
   * Not safe to run concurrently against the same destination.
   * @returns Metadata of the remote file after the last chunk
   */
  async push(
    request: TransferRequest,
    options: PushOptions = {},
  ): Promise<TransferResult> {
    const startTime = Date.now();
    const { sourcePath, destinationPath, remoteTarget: channel } = request;
    const blockSize = this.resolveBlockSize(options.blockSize);
    const activity =
      options.activity ??
      `Pushing ${path.basename(sourcePath)} to ${channel.host}`;

    const totalBytes = await this.statSource(sourcePath);
    this.throwIfAborted(options.signal, destinationPath, 0, 0);

    if (!channel.isOpen) {
      throw new RemoteChannelError(`Channel to ${channel.host} is closed`, {
        host: channel.host,
        path: destinationPath,
      });
    }

    const chunkCount = Math.ceil(totalBytes / blockSize);
    this.logger.log(
      `[${channel.host}] Pushing ${sourcePath} → ${destinationPath}: ${(totalBytes / (1024 * 1024)).toFixed(2)} MB in ${chunkCount} chunk(s) of ${blockSize} bytes`,
    );

    await this.prepareDestination(channel, destinationPath);

    const report = (bytesSent: number, chunksSent: number): void => {
      const update: ProgressUpdate = {
        activity,
        status:
          totalBytes === 0
            ? 'Empty source, destination created'
            : `Chunk ${chunksSent} of ${chunkCount}`,
        percentComplete:
          totalBytes === 0 ? 100 : (bytesSent / totalBytes) * 100,
        bytesSent,
        totalBytes,
        chunksSent,
      };
      this.progressReporter.report(update);
      options.onProgress?.(update);
    };

    if (totalBytes === 0) {
      report(0, 0);
    }

    const chunksSent = await this.sendChunks(
      request,
      totalBytes,
      blockSize,
      options.signal,
      report,
    );

    const remoteFile = await this.verify(channel, destinationPath, totalBytes);

    const duration = (Date.now() - startTime) / 1000;
    const averageSpeed =
      duration > 0 ? totalBytes / (1024 * 1024) / duration : 0;

    this.logger.log(
      `[${channel.host}] ✅ Push completed: ${remoteFile.path} (${remoteFile.size} bytes) in ${duration.toFixed(1)}s - ${averageSpeed.toFixed(2)} MB/s`,
    );

    return {
      remotePath: destinationPath,
      fileSize: totalBytes,
      chunksSent,
      duration,
      averageSpeed,
      remoteFile,
    };
  }

  private resolveBlockSize(requested?: number): number {
    const blockSize =
      requested ??
      this.configService.get<number>('transfer.blockSize') ??
      DEFAULT_BLOCK_SIZE;

    if (!Number.isSafeInteger(blockSize) || blockSize <= 0) {
      throw new RangeError(
        `Block size must be a positive integer, got ${blockSize}`,
      );
    }
    return blockSize;
  }

  private async statSource(sourcePath: string): Promise<number> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(sourcePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Source not found: ${sourcePath} (${reason})`);
      throw new LocalSourceError(
        `Source not found: ${sourcePath}`,
        { path: sourcePath },
        { cause: error },
      );
    }

    if (!stats.isFile()) {
      this.logger.error(`Source is not a regular file: ${sourcePath}`);
      throw new LocalSourceError(
        `Source is not a regular file: ${sourcePath}`,
        { path: sourcePath },
      );
    }

    return stats.size;
  }

  /**
   * Drop any stale destination, create its directory and an empty file
   */
  private async prepareDestination(
    channel: RemoteChannel,
    destinationPath: string,
  ): Promise<void> {
    for (const operation of [REMOVE_FILE, ENSURE_PARENT_DIRECTORY, TOUCH_FILE]) {
      const result = await this.invoke(channel, operation, [destinationPath], {
        path: destinationPath,
      });

      if (result.exitCode !== 0) {
        const detail = result.stderr || `exit code ${result.exitCode}`;
        this.logger.error(
          `[${channel.host}] ${operation.name} failed for ${destinationPath}: ${detail}`,
        );
        throw new RemotePrepError(
          `Could not prepare ${destinationPath} (${operation.name}): ${detail}`,
          { host: channel.host, path: destinationPath, remoteDetail: detail },
        );
      }
    }
  }

  /**
   * Read and send one block at a time through a single reused buffer
   * @returns Number of chunks acknowledged
   */
  private async sendChunks(
    request: TransferRequest,
    totalBytes: number,
    blockSize: number,
    signal: AbortSignal | undefined,
    report: (bytesSent: number, chunksSent: number) => void,
  ): Promise<number> {
    const { sourcePath, destinationPath, remoteTarget: channel } = request;
    if (totalBytes === 0) {
      return 0;
    }

    const handle = await fs.promises.open(sourcePath, 'r');
    const buffer = Buffer.allocUnsafe(Math.min(blockSize, totalBytes));
    let offset = 0;
    let chunkIndex = 0;

    try {
      while (offset < totalBytes) {
        this.throwIfAborted(signal, destinationPath, offset, chunkIndex);

        const length = Math.min(blockSize, totalBytes - offset);
        const bytesRead = await this.readBlock(
          handle,
          buffer,
          length,
          offset,
          sourcePath,
        );

        await this.writeChunk(
          channel,
          destinationPath,
          buffer.subarray(0, bytesRead),
          chunkIndex,
          offset,
        );

        offset += bytesRead;
        chunkIndex += 1;
        report(offset, chunkIndex);
      }
    } finally {
      await handle.close();
    }

    return chunkIndex;
  }

  private async readBlock(
    handle: FileHandle,
    buffer: Buffer,
    length: number,
    offset: number,
    sourcePath: string,
  ): Promise<number> {
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, length, offset));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LocalSourceError(
        `Could not read ${sourcePath} at offset ${offset}: ${reason}`,
        { path: sourcePath, offset },
        { cause: error },
      );
    }

    if (bytesRead === 0) {
      throw new LocalSourceError(
        `Source ${sourcePath} ended at offset ${offset}, expected more bytes`,
        { path: sourcePath, offset },
      );
    }
    return bytesRead;
  }

  private async writeChunk(
    channel: RemoteChannel,
    destinationPath: string,
    chunk: Buffer,
    chunkIndex: number,
    offset: number,
  ): Promise<void> {
    const context = { path: destinationPath, offset, chunkIndex };
    const result = await this.invoke(
      channel,
      APPEND_CHUNK,
      [destinationPath, String(chunk.length)],
      context,
      chunk,
    );

    if (result.exitCode !== 0) {
      const detail = result.stderr || `exit code ${result.exitCode}`;
      this.logger.error(
        `[${channel.host}] Remote write failed at chunk ${chunkIndex} (offset ${offset}) of ${destinationPath}: ${detail}`,
      );
      throw new RemoteWriteError(
        `Remote write failed at chunk ${chunkIndex} (offset ${offset}) of ${destinationPath}: ${detail}`,
        { host: channel.host, ...context, remoteDetail: detail },
      );
    }
  }

  private async verify(
    channel: RemoteChannel,
    destinationPath: string,
    expectedSize: number,
  ): Promise<RemoteFileInfo> {
    const result = await this.invoke(channel, STAT_FILE, [destinationPath], {
      path: destinationPath,
    });

    const fail = (reason: string): VerificationError => {
      this.logger.error(`[${channel.host}] Verification failed: ${reason}`);
      return new VerificationError(reason, {
        host: channel.host,
        path: destinationPath,
        remoteDetail: result.stderr || undefined,
      });
    };

    if (result.exitCode === STAT_MISSING_EXIT_CODE) {
      throw fail(`${destinationPath} does not exist after transfer`);
    }
    if (result.exitCode !== 0) {
      throw fail(
        `Could not stat ${destinationPath}: ${result.stderr || `exit code ${result.exitCode}`}`,
      );
    }

    const info = parseStatOutput(result.stdout);
    if (!info) {
      throw fail(`Unexpected stat output for ${destinationPath}`);
    }
    if (info.size !== expectedSize) {
      throw fail(
        `${info.path} is ${info.size} bytes, expected ${expectedSize}`,
      );
    }
    return info;
  }

  /**
   * Invoke an operation, tagging channel failures with where they happened
   */
  private async invoke(
    channel: RemoteChannel,
    operation: RemoteOperation,
    args: string[],
    context: { path: string; offset?: number; chunkIndex?: number },
    payload?: Buffer,
  ): Promise<RemoteCommandResult> {
    try {
      return await channel.invoke(operation, args, payload);
    } catch (error) {
      if (!(error instanceof RemoteChannelError)) {
        throw error;
      }

      const where =
        context.chunkIndex !== undefined
          ? ` at chunk ${context.chunkIndex} (offset ${context.offset})`
          : ` during ${operation.name}`;
      this.logger.error(
        `[${channel.host}] Transfer interrupted${where}: ${error.message}`,
      );
      throw new RemoteChannelError(
        `Transfer interrupted${where} of ${context.path}: ${error.message}`,
        { host: channel.host, ...context, remoteDetail: error.message },
        { cause: error },
      );
    }
  }

  private throwIfAborted(
    signal: AbortSignal | undefined,
    destinationPath: string,
    offset: number,
    chunkIndex: number,
  ): void {
    if (signal?.aborted) {
      this.logger.warn(
        `Transfer to ${destinationPath} aborted at chunk ${chunkIndex} (offset ${offset})`,
      );
      throw new TransferAbortedError(
        `Transfer to ${destinationPath} aborted at chunk ${chunkIndex} (offset ${offset})`,
        { path: destinationPath, offset, chunkIndex },
      );
    }
  }
}
