import { RemoteOperationError } from '../../shared/errors';

/** Source path missing, unreadable, or not a regular file */
export class LocalSourceError extends RemoteOperationError {
  readonly code = 'LOCAL_SOURCE';
}

/** Stale destination could not be removed or its directory created */
export class RemotePrepError extends RemoteOperationError {
  readonly code = 'REMOTE_PREP';
}

/** A chunk write was rejected by the remote side */
export class RemoteWriteError extends RemoteOperationError {
  readonly code = 'REMOTE_WRITE';
}

/** The remote file is missing or has the wrong size after the last chunk */
export class VerificationError extends RemoteOperationError {
  readonly code = 'VERIFICATION';
}

/** The caller aborted; the partial destination is left in place */
export class TransferAbortedError extends RemoteOperationError {
  readonly code = 'TRANSFER_ABORTED';
}
