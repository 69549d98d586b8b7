import path from 'path';
import chalk from 'chalk';
import { getCostReduction } from '../core/duration-catalog';
import { createPipeline } from '../core/pipeline';
import { formatSplitSummary } from '../core/sharding';
import { writeGeneratedConfig } from '../output/generated-config';
import { CommandOptions } from '../types';
import { getConfigLocation, getRunOn, getTimeoutPolicy } from '../utils/config';
import { getErrorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { prepareRun, printPlan } from './prepare';

export async function generateCommand(options: CommandOptions): Promise<void> {
  const logger = new Logger(options.verbose);

  try {
    logger.header('suite-splitter - Resmoke Task Generator');
    logger.info('');

    // ============================================
    // 1. CONFIGURATION, TESTS AND TIMING DATA
    // ============================================
    const { config, definition, input, outputDir } = await prepareRun(options, logger);

    // ============================================
    // 2. SPLIT AND GENERATE TASKS
    // ============================================
    const pipeline = createPipeline({
      reduction: getCostReduction(config.split.reduction),
      timeoutPolicy: getTimeoutPolicy(config),
      createMiscSuite: config.split.createMiscSuite,
    });

    const result = pipeline.generate(input, {
      resmokeArgs: config.resmoke.args,
      repeatSuites: config.resmoke.repeatSuites,
      suiteDirectory: outputDir,
    });

    logger.success(
      `Split ${chalk.green(result.suite.totalTestCount)} tests into ${chalk.green(result.tasks.length)} tasks (${result.suite.strategy})`,
    );

    if (options.verbose || options.dryRun) {
      logger.section('Split', formatSplitSummary(result.suite));
      printPlan(result, logger);
    }

    // ============================================
    // 3. WRITE OUTPUT
    // ============================================
    if (options.dryRun) {
      logger.warn('Dry run mode - nothing written');
      return;
    }

    logger.startSpinner(`Writing generated config to ${outputDir}...`);
    const written = await writeGeneratedConfig(result, definition, outputDir, {
      useDefaultTimeouts: config.timeouts.useDefaultTimeouts,
      jobsMax: config.resmoke.jobsMax,
      configLocation: getConfigLocation(config),
      runOn: getRunOn(config),
      requireMultiversion: false,
    });
    logger.succeedSpinner(`Wrote ${written.length} files to ${chalk.cyan(path.resolve(outputDir))}`);
  } catch (err: unknown) {
    logger.stopSpinner();
    logger.error(`Generation failed: ${getErrorMessage(err)}`);

    if (options.verbose && err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
    process.exit(1);
  }
}
