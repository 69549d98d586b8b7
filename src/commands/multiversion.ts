import path from 'path';
import chalk from 'chalk';
import { getCostReduction } from '../core/duration-catalog';
import { getVersionConfigs } from '../core/multiversion';
import { createPipeline } from '../core/pipeline';
import { formatSplitSummary } from '../core/sharding';
import { isSuiteSharded } from '../core/suite-config';
import { writeGeneratedConfig } from '../output/generated-config';
import { CommandOptions } from '../types';
import { getConfigLocation, getRunOn, getTaskName, getTimeoutPolicy } from '../utils/config';
import { getErrorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { prepareRun, printPlan } from './prepare';

export interface MultiversionOptions extends CommandOptions {
  sharded?: boolean;
}

export async function multiversionCommand(options: MultiversionOptions): Promise<void> {
  const logger = new Logger(options.verbose);

  try {
    logger.header('suite-splitter - Multiversion Task Generator');
    logger.info('');

    const { config, definition, input, outputDir } = await prepareRun(options, logger);

    // Fixture decides the topology unless --sharded forces it
    const sharded = options.sharded || isSuiteSharded(definition);
    const versionConfigs = getVersionConfigs(sharded);
    logger.info(
      `Version mixes (${sharded ? 'sharded' : 'replica set'}): ${versionConfigs.map(v => chalk.cyan(v.label)).join(', ')}`,
    );

    const pipeline = createPipeline({
      reduction: getCostReduction(config.split.reduction),
      timeoutPolicy: getTimeoutPolicy(config),
      createMiscSuite: config.split.createMiscSuite,
    });

    const result = pipeline.generateMultiversion(input, versionConfigs, {
      resmokeArgs: config.resmoke.args,
      repeatSuites: config.resmoke.repeatSuites,
      suiteDirectory: outputDir,
      parentTaskName: getTaskName(config),
      excludeTags: [config.multiversion.requiresFcvTag],
      tagFile: `${outputDir}/${config.multiversion.tagFile}`,
    });

    logger.success(
      `Split ${chalk.green(result.suite.totalTestCount)} tests into ${chalk.green(result.tasks.length)} tasks across ${versionConfigs.length} version mixes`,
    );

    if (options.verbose || options.dryRun) {
      logger.section('Split', formatSplitSummary(result.suite));
      printPlan(result, logger);
    }

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
      requireMultiversion: true,
    });
    logger.succeedSpinner(`Wrote ${written.length} files to ${chalk.cyan(path.resolve(outputDir))}`);
  } catch (err: unknown) {
    logger.stopSpinner();
    logger.error(`Multiversion generation failed: ${getErrorMessage(err)}`);

    if (options.verbose && err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
    process.exit(1);
  }
}
