#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerBackupCommands } from './commands/backup';
import { registerVersionCommand } from './commands/version';
import { getBuildInfo } from '../lib/build-info';
import { describeError } from '../lib/errors';
import { isLogLevel, setLogLevel } from '../lib/logger';

const logLevel = process.env.MIKROTIK_LOG_LEVEL;
if (logLevel && isLogLevel(logLevel)) {
  setLogLevel(logLevel);
}

const buildInfo = getBuildInfo();
const program = new Command();

program
  .name('mikrotik-backup')
  .description(
    'MikroTik RouterOS configuration backup tool.\nConnects to a device over SSH and exports its configuration to a local file.'
  )
  .version(buildInfo.version);

registerBackupCommands(program);
registerVersionCommand(program, buildInfo);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
