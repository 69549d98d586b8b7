import {
  GeneratedSuite,
  GenerationResult,
  SplitConfig,
  SuiteSplitParams,
  TestRef,
  VersionMixConfig,
} from '../types';
import { CostReduction, DurationCatalog } from './duration-catalog';
import { MultiversionExpander, MultiversionTaskParams } from './multiversion';
import { SubSuiteIdentity } from './naming';
import { OverflowPolicyApplied, SuitePartitioner } from './sharding';
import { ResmokeTaskGenerator, ResmokeTaskParams } from './task-generator';
import { TimeoutEstimator, TimeoutPolicy } from './timeout';

export interface PipelineOptions {
  reduction?: CostReduction;
  timeoutPolicy?: Partial<TimeoutPolicy>;
  createMiscSuite: boolean;
}

export interface PipelineInput {
  tests: readonly TestRef[];
  /** Historical suite definition; tests outside it land in the misc suite */
  knownTests?: readonly TestRef[];
  catalog: DurationCatalog;
  splitConfig: SplitConfig;
  params: SuiteSplitParams;
  onOverflow?: (event: OverflowPolicyApplied) => void;
}

/**
 * partition -> estimate timeouts -> name -> (optionally) expand per version mix
 */
export class TaskGenerationPipeline {
  constructor(
    private readonly partitioner: SuitePartitioner,
    private readonly taskGenerator: ResmokeTaskGenerator,
    private readonly expander: MultiversionExpander,
    private readonly createMiscSuite: boolean,
  ) {}

  generate(input: PipelineInput, taskParams: ResmokeTaskParams): GenerationResult {
    const suite = this.split(input);
    const tasks = this.taskGenerator.generateTasks(suite, taskParams);
    return { suite, tasks, displayTask: this.taskGenerator.displayTask(suite, tasks) };
  }

  generateMultiversion(
    input: PipelineInput,
    versionConfigs: readonly VersionMixConfig[],
    taskParams: MultiversionTaskParams,
  ): GenerationResult {
    const suite = this.split(input);
    const tasks = this.expander.expand(suite, versionConfigs, taskParams);
    return { suite, tasks, displayTask: this.expander.displayTask(suite, tasks) };
  }

  private split(input: PipelineInput): GeneratedSuite {
    return this.partitioner.partition(input.tests, input.catalog, input.splitConfig, input.params, {
      createMisc: this.createMiscSuite,
      knownTests: input.knownTests,
      onOverflow: input.onOverflow,
    });
  }
}

/**
 * Composition root: every collaborator is built here and passed down.
 */
export function createPipeline(options: PipelineOptions): TaskGenerationPipeline {
  const identity = new SubSuiteIdentity();
  const estimator = new TimeoutEstimator(options.timeoutPolicy);

  return new TaskGenerationPipeline(
    new SuitePartitioner(options.reduction),
    new ResmokeTaskGenerator(identity, estimator),
    new MultiversionExpander(identity, estimator),
    options.createMiscSuite,
  );
}
