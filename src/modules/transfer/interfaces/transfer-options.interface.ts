import { RemoteChannel } from '../../shared/interfaces';

/**
 * One push of a local file to a remote path.
 * Immutable for the duration of the transfer.
 */
export interface TransferRequest {
  /** Local file; must exist and be a regular file */
  readonly sourcePath: string;

  /** Remote file; relative paths resolve against the remote working directory */
  readonly destinationPath: string;

  /** Open channel the chunks are written through */
  readonly remoteTarget: RemoteChannel;
}

/**
 * Progress Update Interface
 * Emitted after the destination is prepared (empty sources) and after every chunk
 */
export interface ProgressUpdate {
  activity: string;
  status: string;
  /** 0..100, non-decreasing within one transfer; the last update is 100 */
  percentComplete: number;
  bytesSent: number;
  totalBytes: number;
  /** Number of chunks acknowledged so far */
  chunksSent: number;
}

/**
 * Observability sink for transfer progress.
 * Has no effect on the transfer itself.
 */
export interface ProgressReporter {
  report(update: ProgressUpdate): void;
}

/**
 * Push Options Interface
 */
export interface PushOptions {
  /** Bytes per chunk (default: `transfer.blockSize`, then 1 MiB) */
  blockSize?: number;

  /** Activity label used in progress updates */
  activity?: string;

  /** Called with every progress update, after the module's reporter */
  onProgress?: (update: ProgressUpdate) => void;

  /** Checked at every chunk boundary */
  signal?: AbortSignal;
}

/**
 * Remote File Info Interface
 * Metadata of the destination as reported by the remote host
 */
export interface RemoteFileInfo {
  /** Absolute remote path */
  path: string;
  exists: boolean;
  size: number;
}

/**
 * Transfer Result Interface
 */
export interface TransferResult {
  /** Destination as requested */
  remotePath: string;

  /** Source size in bytes */
  fileSize: number;

  chunksSent: number;

  /** Transfer duration in seconds */
  duration: number;

  /** Average speed in MB/s */
  averageSpeed: number;

  remoteFile: RemoteFileInfo;
}
