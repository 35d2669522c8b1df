/**
 * Where a remote failure happened.
 * Only the fields that apply to the failing step are set.
 */
export interface RemoteErrorContext {
  host?: string;
  path?: string;
  offset?: number;
  chunkIndex?: number;
  /** stderr (or message) reported by the remote side */
  remoteDetail?: string;
}

export type RemoteErrorCode =
  | 'REMOTE_CHANNEL'
  | 'LOCAL_SOURCE'
  | 'REMOTE_PREP'
  | 'REMOTE_WRITE'
  | 'VERIFICATION'
  | 'TRANSFER_ABORTED';

/**
 * Base class of every error raised while talking to a remote host
 */
export abstract class RemoteOperationError extends Error {
  abstract readonly code: RemoteErrorCode;

  constructor(
    message: string,
    readonly context: RemoteErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The channel is closed, unauthenticated, unreachable, or dropped mid-command
 */
export class RemoteChannelError extends RemoteOperationError {
  readonly code = 'REMOTE_CHANNEL';
}
