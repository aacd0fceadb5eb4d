import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import { Client } from 'ssh2';
import type { ConnectConfig } from 'ssh2';
import type { SshConfig } from '../interfaces';
import { SSH_CONFIG } from '../discovery.tokens';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Raised when a remote command cannot be run or does not exit with status 0.
 */
export class SshCommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr?: string,
  ) {
    super(message);
    this.name = 'SshCommandError';
  }
}

/**
 * Runs shell commands on the Podman host over SSH.
 *
 * Every command gets its own connection. Commands run once per tick plus once
 * per backend, which keeps a long-lived session from going stale between ticks.
 */
@Injectable()
export class SshCommandService implements OnModuleInit {
  private readonly logger = new Logger(SshCommandService.name);
  private privateKey?: Buffer;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(@Inject(SSH_CONFIG) private readonly config: SshConfig) {}

  /**
   * Loads the private key so a missing mount fails startup instead of the first tick.
   */
  onModuleInit(): void {
    try {
      this.privateKey = fs.readFileSync(this.config.privateKeyPath);
    } catch (error) {
      throw new Error(
        `Failed to read SSH private key at ${this.config.privateKeyPath} (ensure it is mounted): ${getErrorMessage(error)}`,
      );
    }

    this.logger.log('SSH client configured', {
      user: this.config.username,
      address: `${this.config.host}:${this.config.port}`,
      keyPath: this.config.privateKeyPath,
    });
  }

  /**
   * Executes a command and resolves with its standard output.
   * @throws {SshCommandError} On connection failure, timeout, or any exit other than 0.
   */
  run(command: string): Promise<string> {
    const privateKey = this.privateKey;
    if (!privateKey) {
      return Promise.reject(new SshCommandError('SSH client not initialised'));
    }

    return new Promise<string>((resolve, reject) => {
      const connection = new Client();
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let exitCode: number | undefined;
      let exitSignal: string | undefined;
      let settled = false;

      const finish = (error?: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        connection.end();
        if (error) {
          reject(error);
        } else {
          resolve(Buffer.concat(stdout).toString('utf8'));
        }
      };

      const timer = setTimeout(() => {
        finish(new SshCommandError(`Command timed out after ${this.config.timeout}ms: ${command}`));
      }, this.config.timeout);

      connection
        .on('ready', () => {
          connection.exec(command, (execError, channel) => {
            if (execError) {
              finish(new SshCommandError(`Failed to start command '${command}': ${execError.message}`));
              return;
            }

            channel.on('data', (chunk: Buffer) => stdout.push(chunk));
            channel.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
            channel.on('exit', (code: number | null, signal?: string) => {
              exitCode = code ?? undefined;
              exitSignal = signal;
            });
            channel.on('close', () => {
              if (exitCode === 0) {
                finish();
                return;
              }

              // No exit status means the command was killed or the channel dropped; its output may be truncated
              const errorOutput = Buffer.concat(stderr).toString('utf8').trim();
              const reason =
                exitCode !== undefined
                  ? `exited with code ${exitCode}`
                  : exitSignal
                    ? `was terminated by signal ${exitSignal}`
                    : 'ended without an exit status';
              finish(
                new SshCommandError(
                  `Command '${command}' ${reason}${errorOutput ? `: ${errorOutput}` : ''}`,
                  exitCode,
                  errorOutput,
                ),
              );
            });
          });
        })
        .on('error', (error: Error) => {
          finish(
            new SshCommandError(`SSH connection to ${this.config.host}:${this.config.port} failed: ${error.message}`),
          );
        })
        .connect(this.buildConnectConfig(privateKey));
    });
  }

  private buildConnectConfig(privateKey: Buffer): ConnectConfig {
    return {
      host: this.config.host,
      port: this.config.port,
      username: this.config.username,
      privateKey,
      readyTimeout: this.config.timeout,
    };
  }
}
