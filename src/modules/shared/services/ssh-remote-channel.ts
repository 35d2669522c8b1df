import { Logger } from '@nestjs/common';
import { Client } from 'ssh2';
import { RemoteChannelError } from '../errors';
import {
  RemoteChannel,
  RemoteCommandResult,
  RemoteOperation,
} from '../interfaces';

/**
 * Quote a value for a POSIX shell command line
 */
export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Build the command line for a script block.
 * The operation name becomes $0 so it shows up in remote error messages.
 */
export function buildRemoteCommand(
  name: string,
  script: string,
  args: string[],
): string {
  return ['/bin/bash', '-c', script, name, ...args]
    .map((part, index) => (index === 0 ? part : quoteShellArg(part)))
    .join(' ');
}

/**
 * Remote channel over one long-lived SSH session.
 * Every invocation is a separate exec on the same connection.
 */
export class SshRemoteChannel implements RemoteChannel {
  private readonly logger = new Logger(SshRemoteChannel.name);
  private open = true;

  constructor(
    private readonly conn: Client,
    readonly host: string,
  ) {
    conn
      .on('close', () => {
        this.open = false;
      })
      .on('end', () => {
        this.open = false;
      })
      .on('error', (err) => {
        this.open = false;
        this.logger.error(`[${host}] SSH session error: ${err.message}`);
      });
  }

  get isOpen(): boolean {
    return this.open;
  }

  invoke(
    operation: RemoteOperation,
    args: string[],
    payload?: Buffer,
  ): Promise<RemoteCommandResult> {
    return this.execute(operation.name, operation.script, args, payload);
  }

  runScript(script: string, args: string[] = []): Promise<RemoteCommandResult> {
    return this.execute('script', script, args);
  }

  async close(): Promise<void> {
    if (!this.open) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.conn.once('close', () => resolve());
      this.conn.end();
    });
    this.logger.debug(`[${this.host}] SSH session closed`);
  }

  private execute(
    name: string,
    script: string,
    args: string[],
    payload?: Buffer,
  ): Promise<RemoteCommandResult> {
    if (!this.open) {
      return Promise.reject(
        new RemoteChannelError(`Channel to ${this.host} is closed`, {
          host: this.host,
        }),
      );
    }

    const command = buildRemoteCommand(name, script, args);

    return new Promise((resolve, reject) => {
      this.conn.exec(command, (err, stream) => {
        if (err) {
          return reject(
            new RemoteChannelError(
              `${name} could not start on ${this.host}: ${err.message}`,
              { host: this.host, remoteDetail: err.message },
              { cause: err },
            ),
          );
        }

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode: number | null = null;
        let exitSignal: string | undefined;

        stream
          .on('exit', (code: number | null, signal?: string) => {
            exitCode = code;
            exitSignal = signal;
          })
          .on('close', () => {
            if (exitCode === null) {
              const reason = exitSignal ? ` (signal ${exitSignal})` : '';
              reject(
                new RemoteChannelError(
                  `${name} on ${this.host} ended without an exit status${reason}`,
                  { host: this.host },
                ),
              );
              return;
            }

            resolve({
              exitCode,
              stdout: Buffer.concat(stdout).toString('utf8'),
              stderr: Buffer.concat(stderr).toString('utf8').trim(),
            });
          })
          .on('data', (data: Buffer) => {
            stdout.push(data);
          })
          .stderr.on('data', (data: Buffer) => {
            stderr.push(data);
          });

        if (payload) {
          stream.end(payload);
        } else {
          stream.end();
        }
      });
    });
  }
}
