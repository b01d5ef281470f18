import { Command } from 'commander';
import chalk from 'chalk';
import { BuildInfo } from '../../interfaces';

export function formatBuildInfo(name: string, info: BuildInfo): string[] {
  return [
    `${name} version ${info.version}`,
    `  commit: ${info.commit}`,
    `  built:  ${info.date}`,
    `  node:   ${info.nodeVersion}`,
  ];
}

export function registerVersionCommand(program: Command, info: BuildInfo) {
  // example: npx tsx src/cli/index.ts version
  program
    .command('version')
    .alias('v')
    .description('Print version information')
    .action(() => {
      const [headline, ...details] = formatBuildInfo(program.name(), info);
      console.log(chalk.bold(headline));
      for (const line of details) {
        console.log(chalk.dim(line));
      }
    });
}
