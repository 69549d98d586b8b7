import path from 'path';
import chalk from 'chalk';
import { Logger } from '../utils/logger';
import { saveConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from '../utils/config';
import { getErrorMessage } from '../utils/errors';
import { SuiteSplitterConfig } from '../types';

interface InitOptions {
  force?: boolean;
  task?: string;
  variant?: string;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const logger = new Logger();

  try {
    logger.header('Initializing suite-splitter configuration');

    const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);

    const config: SuiteSplitterConfig = {
      ...DEFAULT_CONFIG,
      task: {
        ...DEFAULT_CONFIG.task,
        name: options.task || DEFAULT_CONFIG.task.name,
        buildVariant: options.variant || DEFAULT_CONFIG.task.buildVariant,
      },
    };

    logger.startSpinner('Creating configuration file...');

    await saveConfig(configPath, config, options.force);

    logger.succeedSpinner(`Created ${chalk.cyan(DEFAULT_CONFIG_FILE)}`);

    // Show next steps
    logger.info('');
    logger.info('Next steps:');
    logger.info(`  1. Set task.project and resmoke.suiteDirectory in ${DEFAULT_CONFIG_FILE}`);
    logger.info('  2. Export EVERGREEN_API_USER and EVERGREEN_API_KEY for historic stats');
    logger.info('  3. Preview the split:');
    logger.info(`     ${chalk.cyan('suite-splitter generate --dry-run')}`);
  } catch (err: unknown) {
    logger.failSpinner();
    logger.error(`Failed to initialize: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}
