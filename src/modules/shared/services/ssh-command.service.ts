import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Client, ConnectConfig } from 'ssh2';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RemoteChannelError } from '../errors';
import { SshConfig, SshSessionOptions } from '../interfaces';
import { SshRemoteChannel } from './ssh-remote-channel';

/**
 * SSH Command Service
 * Opens remote channels and runs one-off commands over SSH
 */
@Injectable()
export class SshCommandService {
  private readonly logger = new Logger(SshCommandService.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Open a long-lived channel to the host.
   * The caller owns the channel and must close it.
   */
  async openChannel(sshConfig: SshConfig): Promise<SshRemoteChannel> {
    const conn = new Client();

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.logger.error(
          `SSH connection to ${sshConfig.host} failed: ${err.message}`,
        );
        reject(
          new RemoteChannelError(
            `SSH connection to ${sshConfig.host} failed: ${err.message}`,
            { host: sshConfig.host, remoteDetail: err.message },
            { cause: err },
          ),
        );
      };

      conn
        .once('ready', () => {
          conn.removeListener('error', onError);
          this.logger.log(`SSH Connected to ${sshConfig.host}`);
          resolve(new SshRemoteChannel(conn, sshConfig.host));
        })
        .once('error', onError)
        .connect(this.buildConnectConfig(sshConfig));
    });
  }

  /**
   * Execute a single command on a fresh connection
   * @returns Command output as string
   */
  async executeCommand(sshConfig: SshConfig, command: string): Promise<string> {
    const channel = await this.openChannel(sshConfig);

    try {
      const result = await channel.runScript(command);
      if (result.exitCode !== 0) {
        this.logger.error(
          `Command failed with code ${result.exitCode}: ${result.stderr}`,
        );
        throw new Error(
          `Command failed with code ${result.exitCode}: ${result.stderr}`,
        );
      }
      return result.stdout;
    } finally {
      await channel.close();
    }
  }

  /**
   * Test SSH connection
   * @returns True if connection successful
   */
  async testConnection(sshConfig: SshConfig): Promise<boolean> {
    try {
      const output = await this.executeCommand(sshConfig, 'echo connected');
      return output.trim() === 'connected';
    } catch (error) {
      this.logger.error(
        `Connection test failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Build SSH connection configuration
   */
  private buildConnectConfig(sshConfig: SshConfig): ConnectConfig {
    const session = this.getSessionOptions();
    const config: ConnectConfig = {
      host: sshConfig.host,
      port: sshConfig.port || 22,
      username: sshConfig.username,
      readyTimeout: session.readyTimeout,
      keepaliveInterval: session.keepaliveInterval,
      keepaliveCountMax: session.keepaliveCountMax,
    };

    if (sshConfig.password) {
      config.password = sshConfig.password;
    }

    if (sshConfig.privateKey) {
      config.privateKey = fs.readFileSync(expandHome(sshConfig.privateKey));
    }

    return config;
  }

  private getSessionOptions(): SshSessionOptions {
    return {
      readyTimeout: this.configService.get<number>('ssh.readyTimeout') ?? 30000,
      keepaliveInterval:
        this.configService.get<number>('ssh.keepaliveInterval') ?? 10000,
      keepaliveCountMax:
        this.configService.get<number>('ssh.keepaliveCountMax') ?? 3,
    };
  }
}

function expandHome(filePath: string): string {
  return filePath.startsWith('~/')
    ? path.join(os.homedir(), filePath.slice(2))
    : filePath;
}
