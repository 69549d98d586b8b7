#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { generateCommand } from './commands/generate';
import { multiversionCommand } from './commands/multiversion';
import { initCommand } from './commands/init';
import { version } from '../package.json';

const program = new Command();

program
  .name('suite-splitter')
  .description('Split resmoke suites into balanced, time-bounded CI tasks')
  .version(version);

// Main command: split a suite into generated tasks
program
  .command('generate')
  .description('Split a suite into sub-suites and write the generated task config')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <dir>', 'Directory for generated files')
  .option('--timing-file <path>', 'Read historic run times from a local JSON file')
  .option('-v, --verbose', 'Verbose output', false)
  .option('--dry-run', 'Show the split without writing files', false)
  .action(generateCommand);

// Same split, fanned out over mixed-version clusters
program
  .command('multiversion')
  .description('Generate one task per sub-suite and mixed-version cluster')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <dir>', 'Directory for generated files')
  .option('--timing-file <path>', 'Read historic run times from a local JSON file')
  .option('--sharded', 'Use sharded version mixes regardless of the suite fixture', false)
  .option('-v, --verbose', 'Verbose output', false)
  .option('--dry-run', 'Show the split without writing files', false)
  .action(multiversionCommand);

// Initialize configuration
program
  .command('init')
  .description('Initialize suite-splitter configuration')
  .option('-f, --force', 'Overwrite existing config', false)
  .option('-t, --task <name>', 'Generator task name, e.g. jsCore_gen')
  .option('--variant <name>', 'Build variant the tasks run on')
  .action(initCommand);

// Error handling
program.exitOverride();

async function main(): Promise<void> {
  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exit(err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode);
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red('Error:'), message);
  process.exit(1);
});
