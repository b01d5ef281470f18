import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { once } from 'events';
import { finished } from 'stream/promises';
import { BackupService } from '../../classes/backup-service';
import { RemoteExecutor } from '../../classes/remote-executor';
import {
  BackupCommandOptions,
  SSHClient,
  SSHConnectionConfig,
} from '../../interfaces';
import { anySignal, shutdownSignal } from '../../lib/abort';
import { BackupError, isAbortError } from '../../lib/errors';
import { logger, setLogLevel } from '../../lib/logger';
import {
  sanitizeOutputPath,
  sanitizePort,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
  sanitizeTimeout,
  ValidationError,
} from '../../lib/sanitization';

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_USERNAME = 'admin';
export const DEFAULT_OUTPUT = 'backup.rsc';

export interface BackupDependencies {
  /**
   * @description Creates the transport for one backup. Defaults to a node-ssh backed RemoteExecutor.
   */
  createClient?: () => SSHClient;
  /**
   * @description Aborts the backup. The command line also aborts on SIGINT and SIGTERM.
   */
  signal?: AbortSignal;
}

export interface BackupResult {
  outputPath: string;
  bytesWritten: number;
}

/**
 * Builds the connection parameters from the parsed options. Exactly one
 * credential is not enforced, but at least one must be present.
 */
export function buildConnectionConfig(
  options: BackupCommandOptions
): SSHConnectionConfig {
  const password = options.password || undefined;
  const keyFile = options.key || process.env.MIKROTIK_KEY || undefined;

  if (!password && !keyFile) {
    throw new ValidationError('either --password or --key must be provided');
  }

  const config: SSHConnectionConfig = {
    host: sanitizeSSHHost(options.host),
    port: sanitizePort(options.port),
    username: sanitizeSSHUsername(options.username),
  };

  if (password) {
    config.password = password;
  }
  if (keyFile) {
    config.keyFile = sanitizeSSHKeyPath(keyFile);
    if (options.passphrase) {
      config.passphrase = options.passphrase;
    }
  }

  return config;
}

/**
 * Runs one backup and moves the result into place. The export is first
 * written to `<output>.partial`, so a failed run leaves any previous backup
 * untouched.
 */
export async function runBackup(
  options: BackupCommandOptions,
  dependencies: BackupDependencies = {}
): Promise<BackupResult> {
  const config = buildConnectionConfig(options);
  const outputPath = sanitizeOutputPath(options.output);
  const timeoutMs = options.timeout
    ? sanitizeTimeout(options.timeout)
    : undefined;

  const signal = anySignal(
    dependencies.signal,
    timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined
  );

  logger.info(
    chalk.bold(
      `💾 Backing up configuration from ${config.host}:${config.port}`
    )
  );
  logger.info(chalk.dim(`Username: ${config.username}`));
  logger.info(chalk.dim(`Output: ${outputPath}`));
  logger.info(
    config.keyFile
      ? chalk.blue('🔑 Using private key authentication')
      : chalk.yellow('⚠️  Using password authentication')
  );

  const partialPath = `${outputPath}.partial`;
  const destination = fs.createWriteStream(partialPath, { mode: 0o600 });
  await once(destination, 'ready');

  const client = dependencies.createClient
    ? dependencies.createClient()
    : new RemoteExecutor();
  const service = new BackupService(client);
  service.on('stateChange', (state, previous) => {
    logger.debug(`Backup state: ${previous} -> ${state}`);
  });

  try {
    await service.execute(config, destination, signal);
    destination.end();
    await finished(destination);
  } catch (error) {
    destination.destroy();
    await fs.promises.rm(partialPath, { force: true });
    if (error instanceof BackupError && isAbortError(error.cause)) {
      logger.warn('Backup aborted, no output written');
    }
    throw error;
  }

  try {
    await fs.promises.rename(partialPath, outputPath);
  } catch (error) {
    await fs.promises.rm(partialPath, { force: true });
    throw error;
  }

  const result = { outputPath, bytesWritten: destination.bytesWritten };
  logger.info(
    chalk.green(
      `✅ Backup written to ${result.outputPath} (${result.bytesWritten} bytes)`
    )
  );
  return result;
}

export function registerBackupCommands(
  program: Command,
  dependencies: BackupDependencies = {}
) {
  // example: npx tsx src/cli/index.ts backup --host 192.168.88.1 --username admin --key ~/.ssh/id_ed25519 --output router.rsc
  program
    .command('backup')
    .description(
      'Connect to a MikroTik device and backup its configuration.\nSupports both password and SSH key-based authentication.'
    )
    .addOption(
      new Option('-H, --host <host>', 'MikroTik device hostname or IP address')
        .env('MIKROTIK_HOST')
        .makeOptionMandatory()
    )
    .addOption(
      new Option('-p, --port <port>', 'SSH port')
        .env('MIKROTIK_PORT')
        .default(String(DEFAULT_SSH_PORT))
    )
    .addOption(
      new Option('-u, --username <username>', 'SSH username')
        .env('MIKROTIK_USERNAME')
        .default(DEFAULT_USERNAME)
    )
    .addOption(
      new Option(
        '-P, --password <password>',
        'SSH password (use with caution, prefer SSH key)'
      ).env('MIKROTIK_PASSWORD')
    )
    .addOption(
      new Option('-k, --key <path>', 'Path to SSH private key file').env(
        'MIKROTIK_KEY_FILE'
      )
    )
    .addOption(
      new Option('--passphrase <passphrase>', 'Passphrase for the private key').env(
        'MIKROTIK_PASSPHRASE'
      )
    )
    .addOption(
      new Option('-o, --output <path>', 'Output file path for the backup')
        .env('MIKROTIK_OUTPUT')
        .default(DEFAULT_OUTPUT)
    )
    .addOption(
      new Option(
        '-t, --timeout <seconds>',
        'Abort the backup after this many seconds'
      ).env('MIKROTIK_TIMEOUT')
    )
    .option('-v, --verbose', 'Print debug output')
    .action(async (options: BackupCommandOptions) => {
      if (options.verbose) {
        setLogLevel('debug');
      }
      const shutdown = shutdownSignal();
      try {
        await runBackup(options, {
          ...dependencies,
          signal: anySignal(dependencies.signal, shutdown.signal),
        });
      } finally {
        shutdown.release();
      }
    });
}
