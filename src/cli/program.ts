import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import Table from 'cli-table3';
import { Command, CommanderError } from 'commander';
import { AppModule } from '../app.module';
import { toValidatedDto } from '../common/validation';
import { SshCommandService } from '../modules/shared/services';
import { RemoteOperationError } from '../modules/shared/errors';
import { PushFileDto, SshTargetDto } from '../modules/transfer/dto/push-file.dto';
import { TransferResult } from '../modules/transfer/interfaces';
import { FileTransferService } from '../modules/transfer/services';

type RunCliOptions = {
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
};

type TargetOptions = {
  host?: string;
  port?: string;
  username?: string;
  password?: string;
  privateKey?: string;
  verbose?: boolean;
};

type PushCommandOptions = TargetOptions & { blockSize?: string };

const DEFAULT_LEVELS: LogLevel[] = ['log', 'warn', 'error'];
const VERBOSE_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'debug', 'verbose'];

export function createProgram(io: Required<RunCliOptions>): Command {
  const program = new Command();

  program
    .name('twotier-deploy')
    .description('Push files to, and check, the hosts of a two-tier deployment over SSH.')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  const withTarget = (command: Command): Command =>
    command
      .option('--host <host>', 'SSH host (default: SSH_HOST)')
      .option('--port <port>', 'SSH port (default: SSH_PORT or 22)')
      .option('--username <user>', 'SSH username (default: SSH_USERNAME)')
      .option('--password <password>', 'SSH password (default: SSH_PASSWORD)')
      .option('--private-key <path>', 'Private key file (default: SSH_PRIVATE_KEY)')
      .option('-v, --verbose', 'Log debug output');

  withTarget(program.command('push'))
    .description('Push a local file to a remote path in fixed-size chunks')
    .argument('<source>', 'Local file')
    .argument('<destination>', 'Remote path, relative to the remote home directory if not absolute')
    .option('--block-size <bytes>', 'Chunk size in bytes (default: TRANSFER_BLOCK_SIZE or 1 MiB)')
    .action(async (source: string, destination: string, options: PushCommandOptions) => {
      await withContext(options.verbose, async (app) => {
        const dto = await toValidatedDto(PushFileDto, {
          sourcePath: source,
          destinationPath: destination,
          target: resolveTarget(app.get(ConfigService), options),
          blockSize: options.blockSize,
        });

        const result = await app.get(FileTransferService).pushToHost(dto);
        io.stdout.write(renderTransferResult(dto, result) + '\n');
      });
    });

  withTarget(program.command('check'))
    .description('Test the SSH connection to a host')
    .action(async (options: TargetOptions) => {
      await withContext(options.verbose, async (app) => {
        const target = await toValidatedDto(
          SshTargetDto,
          resolveTarget(app.get(ConfigService), options),
        );

        const connected = await app.get(SshCommandService).testConnection(target);
        if (!connected) {
          throw new Error(`SSH connection to ${target.host} failed`);
        }
        io.stdout.write(`✅ Connected to ${target.username}@${target.host}:${target.port}\n`);
      });
    });

  return program;
}

/**
 * Parse arguments and run one command
 * @returns Process exit code
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io = {
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
  };
  const program = createProgram(io);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr.write(renderFailure(error) + '\n');
    return 1;
  }
}

async function withContext(
  verbose: boolean | undefined,
  run: (app: INestApplicationContext) => Promise<void>,
): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: verbose ? VERBOSE_LEVELS : DEFAULT_LEVELS,
  });
  try {
    await run(app);
  } finally {
    await app.close();
  }
}

/**
 * Command-line flags win over configuration
 */
export function resolveTarget(
  config: ConfigService,
  options: TargetOptions,
): Record<string, unknown> {
  return {
    host: options.host ?? config.get<string>('ssh.host'),
    port: options.port ?? config.get<number>('ssh.port'),
    username: options.username ?? config.get<string>('ssh.username'),
    password: options.password ?? config.get<string>('ssh.password'),
    privateKey: options.privateKey ?? config.get<string>('ssh.privateKey'),
  };
}

export function renderTransferResult(dto: PushFileDto, result: TransferResult): string {
  const table = new Table({
    head: ['Transfer', 'Value'],
    colWidths: [20, 70],
    style: {
      head: ['green', 'bold'],
      border: ['grey'],
    },
  });

  table.push(
    ['📄 Source', dto.sourcePath],
    ['🌐 Host', dto.target.host],
    ['📁 Remote File', result.remoteFile.path],
    ['📦 Size', `${result.fileSize} bytes`],
    ['🧩 Chunks', String(result.chunksSent)],
    ['⏱️  Duration', `${result.duration.toFixed(1)}s`],
    ['🚀 Speed', `${result.averageSpeed.toFixed(2)} MB/s`],
  );

  return table.toString();
}

export function renderFailure(error: unknown): string {
  const table = new Table({
    head: ['Error', 'Detail'],
    colWidths: [20, 70],
    wordWrap: true,
    style: {
      head: ['red', 'bold'],
      border: ['grey'],
    },
  });

  if (error instanceof RemoteOperationError) {
    table.push(['❌ Type', error.name], ['💬 Message', error.message]);
    const { host, path, chunkIndex, offset } = error.context;
    if (host) table.push(['🌐 Host', host]);
    if (path) table.push(['📁 Path', path]);
    if (chunkIndex !== undefined) table.push(['🧩 Chunk', String(chunkIndex)]);
    if (offset !== undefined) table.push(['📍 Offset', String(offset)]);
  } else if (error instanceof Error) {
    table.push(['❌ Type', error.name], ['💬 Message', error.message]);
  } else {
    table.push(['❌ Type', 'Unknown'], ['💬 Message', String(error)]);
  }

  return table.toString();
}
