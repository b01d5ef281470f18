import { NodeSSH } from 'node-ssh';
import {
  ExecutionResult,
  SSHClient,
  SSHConnectionConfig,
} from '../interfaces';
import { raceWithAbort } from '../lib/abort';
import {
  CloseError,
  ConnectError,
  ExecutionError,
  describeError,
} from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';

type NodeSSHConfig = Parameters<NodeSSH['connect']>[0];

export class RemoteExecutor implements SSHClient {
  private ssh: NodeSSH;
  private logger: Logger;
  private connected = false;

  constructor(ssh: NodeSSH = new NodeSSH(), logger: Logger = defaultLogger) {
    this.ssh = ssh;
    this.logger = logger;
  }

  /**
   * Connect to the device
   */
  async connect(
    config: SSHConnectionConfig,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();

    const target = `${config.username}@${config.host}:${config.port}`;
    this.logger.debug(`Connecting to ${target}`);

    const connecting = this.ssh.connect(this.buildConnectConfig(config));

    try {
      await raceWithAbort(connecting, signal, () => this.disposeQuietly());
    } catch (error) {
      if (signal?.aborted) {
        // node-ssh only holds the connection once the key file is read, so a
        // handshake that completes after the abort is torn down when it settles
        connecting.then(
          () => this.disposeQuietly(),
          () => this.disposeQuietly()
        );
        throw error;
      }
      // a failed handshake leaves node-ssh holding the dead connection
      this.disposeQuietly();
      throw new ConnectError(
        `Failed to connect to ${target}: ${describeError(error)}`,
        { cause: error }
      );
    }

    this.connected = true;
    this.logger.debug(`Connected to ${target}`);
  }

  /**
   * Run a command on the device and return its complete stdout
   */
  async executeCommand(command: string, signal?: AbortSignal): Promise<string> {
    const result = await this.run(command, signal);

    if (result.exitCode !== null && result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new ExecutionError(
        `Command ${command} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        { exitCode: result.exitCode, stderr: result.stderr }
      );
    }

    return result.stdout;
  }

  /**
   * Disconnect from the device
   */
  async close(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;

    try {
      this.ssh.dispose();
    } catch (error) {
      throw new CloseError(
        `Failed to disconnect from device: ${describeError(error)}`,
        { cause: error }
      );
    }
    this.logger.debug('Connection closed');
  }

  private disposeQuietly(): void {
    try {
      this.ssh.dispose();
    } catch (error) {
      this.logger.debug(`Ignoring dispose failure: ${describeError(error)}`);
    }
  }

  private async run(
    command: string,
    signal?: AbortSignal
  ): Promise<ExecutionResult> {
    if (!this.connected || !this.ssh.isConnected()) {
      throw new ExecutionError(`Cannot run ${command}: not connected`);
    }
    signal?.throwIfAborted();

    const startTime = Date.now();
    // stdout is collected as raw bytes: execCommand trims its own copy
    const stdout: Buffer[] = [];

    try {
      const result = await raceWithAbort(
        this.ssh.execCommand(command, {
          onStdout: (chunk) => {
            stdout.push(chunk);
          },
        }),
        signal,
        () => this.disposeQuietly()
      );

      const duration = Date.now() - startTime;
      this.logger.debug(`${command} finished in ${duration}ms`);

      return {
        exitCode: result.code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: result.stderr,
        duration,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new ExecutionError(
        `Error executing ${command}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private buildConnectConfig(config: SSHConnectionConfig): NodeSSHConfig {
    const sshConfig: NodeSSHConfig = {
      host: config.host,
      port: config.port,
      username: config.username,
    };

    if (config.password) {
      sshConfig.password = config.password;
    }
    if (config.keyFile) {
      sshConfig.privateKeyPath = config.keyFile;
      if (config.passphrase) {
        sshConfig.passphrase = config.passphrase;
      }
    }
    if (config.readyTimeout !== undefined) {
      sshConfig.readyTimeout = config.readyTimeout;
    }

    return sshConfig;
  }
}
