/**
 * A named script executed on the remote host.
 * The script only sees its positional arguments ($1..$n) and standard input.
 */
export interface RemoteOperation {
  name: string;
  script: string;
}

/**
 * Outcome of one remote invocation.
 * A non-zero exit code is a result, not a channel failure.
 */
export interface RemoteCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Open, authenticated command channel to a single remote host
 */
export interface RemoteChannel {
  readonly host: string;
  readonly isOpen: boolean;

  /**
   * Run a named operation with string arguments.
   * The payload, when given, is delivered on the operation's standard input.
   */
  invoke(
    operation: RemoteOperation,
    args: string[],
    payload?: Buffer,
  ): Promise<RemoteCommandResult>;

  /** Run an inline script block with positional arguments */
  runScript(script: string, args?: string[]): Promise<RemoteCommandResult>;

  close(): Promise<void>;
}
