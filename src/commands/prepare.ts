import chalk from 'chalk';
import { DurationCatalog, EMPTY_CATALOG, loadTimingFile } from '../core/duration-catalog';
import { PipelineInput } from '../core/pipeline';
import { HistoricStatsClient } from '../core/stats-client';
import { loadSuiteDefinition, resolveTests, SuiteDefinition } from '../core/suite-config';
import { CommandOptions, GenerationResult, SplitConfig, SuiteSplitterConfig } from '../types';
import {
  DEFAULT_CONFIG_FILE,
  findConfigFile,
  getSplitConfig,
  getSuiteName,
  getTaskName,
  loadConfig,
  validateConfig,
} from '../utils/config';
import { ConfigurationError, DataUnavailableError } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface PreparedRun {
  config: SuiteSplitterConfig;
  definition: SuiteDefinition;
  input: PipelineInput;
  outputDir: string;
}

async function loadValidConfig(options: CommandOptions, logger: Logger): Promise<SuiteSplitterConfig> {
  logger.startSpinner('Loading configuration...');

  const configPath = options.config || (await findConfigFile()) || DEFAULT_CONFIG_FILE;
  const config = await loadConfig(configPath);

  logger.succeedSpinner(`Loaded config from ${chalk.cyan(configPath)}`);

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(
      ['Configuration errors found:', ...errors.map(err => `  • ${err}`)].join('\n'),
    );
  }
  return config;
}

/**
 * Timing data from a local file when one is given, otherwise from the stats
 * API. An unreachable API degrades to no data at all.
 */
async function loadCatalog(
  config: SuiteSplitterConfig,
  splitConfig: SplitConfig,
  options: CommandOptions,
  logger: Logger,
): Promise<DurationCatalog> {
  const timingFile = options.timingFile || config.stats.timingFile;
  if (timingFile) {
    logger.startSpinner(`Reading timing file ${timingFile}...`);
    const catalog = await loadTimingFile(timingFile);
    logger.succeedSpinner(`Loaded timing data for ${chalk.green(catalog.size)} tests`);
    return catalog;
  }

  logger.startSpinner('Fetching historic test stats...');
  const client = new HistoricStatsClient({
    apiUrl: config.stats.apiUrl,
    apiUser: config.stats.apiUser,
    apiKey: config.stats.apiKey,
    retry: {
      onRetry: (attempt, error) => logger.debug(`Retry ${attempt}: ${error.message}`),
    },
  });

  try {
    const catalog = await client.fetchCatalog({
      project: config.task.project,
      taskName: getTaskName(config),
      buildVariant: config.task.buildVariant,
      window: splitConfig.lookback,
    });
    logger.succeedSpinner(`Loaded timing data for ${chalk.green(catalog.size)} tests`);
    return catalog;
  } catch (err: unknown) {
    if (!(err instanceof DataUnavailableError)) throw err;
    logger.warnSpinner('No historic test stats available');
    logger.warn(err.message);
    logger.warn('Falling back to splitting by test count');
    return EMPTY_CATALOG;
  }
}

export async function prepareRun(options: CommandOptions, logger: Logger): Promise<PreparedRun> {
  const config = await loadValidConfig(options, logger);
  const taskName = getTaskName(config);
  const suiteName = getSuiteName(config);

  logger.startSpinner(`Reading suite ${suiteName}...`);
  const definition = await loadSuiteDefinition(config.resmoke.suiteDirectory, suiteName);
  const tests = await resolveTests(definition, process.cwd());
  logger.succeedSpinner(`Found ${chalk.green(tests.length)} tests in ${chalk.cyan(definition.filePath)}`);

  if (logger.isVerbose) {
    tests.forEach(test => logger.debug(`  • ${test}`));
  }

  const splitConfig = getSplitConfig(config);
  const catalog = await loadCatalog(config, splitConfig, options, logger);

  return {
    config,
    definition,
    outputDir: options.output || config.output.directory,
    input: {
      tests,
      catalog,
      splitConfig,
      params: {
        taskName,
        suiteName,
        buildVariant: config.task.buildVariant,
      },
      onOverflow: event => {
        const where =
          event.policy === 'misc' ? 'the misc suite' : `sub-suite ${event.subSuiteIndex ?? 0}`;
        logger.warn(`${event.test} exceeds the per-suite test cap; moved to ${where}`);
      },
    },
  };
}

/**
 * Execution plan for --dry-run and --verbose
 */
export function printPlan(result: GenerationResult, logger: Logger): void {
  logger.header('Generated Tasks');
  logger.table(
    ['Task', 'Tests', 'Exec timeout', 'Idle timeout'],
    result.tasks.map(task => [
      task.name,
      task.members.length,
      logger.duration(task.timeout.executionTimeoutSecs),
      logger.duration(task.timeout.idleTimeoutSecs),
    ]),
  );
}
