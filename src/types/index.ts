export type TestRef = string;
export type CostReductionName = 'mean' | 'median' | 'max' | 'p90';
export type SplitStrategyName = 'greedy' | 'round-robin';

export interface DurationSample {
  test: TestRef;
  /** Observed run time in seconds */
  durationSecs: number;
  observedAt: Date;
}

export interface LookbackWindow {
  start: Date;
  end: Date;
}

export interface SplitConfig {
  targetTimePerSuiteSecs: number;
  maxSubSuites: number;
  maxTestsPerSuite: number;
  lookback: LookbackWindow;
}

/**
 * Identifies the suite being split and where its tasks run.
 */
export interface SuiteSplitParams {
  taskName: string;
  suiteName: string;
  buildVariant: string;
}

interface SubSuiteFields {
  /** Assignment order, not execution order */
  readonly members: readonly TestRef[];
  readonly estimatedCost: number;
  readonly longestTestCost: number;
  readonly hasTimingData: boolean;
}

export interface SubSuite extends SubSuiteFields {
  readonly kind: 'indexed';
  readonly index: number;
}

export interface MiscSuite extends SubSuiteFields {
  readonly kind: 'misc';
}

export type AnySubSuite = SubSuite | MiscSuite;

export interface GeneratedSuite {
  readonly taskName: string;
  readonly suiteName: string;
  readonly buildVariant: string;
  readonly subSuites: readonly SubSuite[];
  readonly misc?: MiscSuite;
  readonly totalTestCount: number;
  readonly strategy: SplitStrategyName;
}

export interface TimeoutEstimate {
  /** false means the platform default applies */
  readonly isSpecified: boolean;
  readonly executionTimeoutSecs?: number;
  readonly idleTimeoutSecs?: number;
}

export type ClusterTopology =
  | { kind: 'replica-set'; nodes: number; linearChain: boolean }
  | { kind: 'sharded'; shards: number; nodesPerShard: number };

export interface VersionMixConfig {
  /** e.g. "new-old-new", one version per node */
  label: string;
  topology: ClusterTopology;
}

export type TaskArg =
  | { readonly kind: 'option'; readonly flag: string; readonly value?: string }
  | { readonly kind: 'positional'; readonly value: string };

export interface GeneratedTask {
  readonly name: string;
  /** Name of the generated suite file this task runs, without variant or extension */
  readonly subSuiteName: string;
  readonly subSuiteKind: AnySubSuite['kind'];
  readonly members: readonly TestRef[];
  /** Only set for misc tasks: tests already covered by indexed sub-suites */
  readonly excludedTests: readonly TestRef[];
  readonly timeout: TimeoutEstimate;
  readonly extraArgs: readonly TaskArg[];
  readonly versionMix?: string;
}

export interface DisplayTask {
  readonly name: string;
  readonly executionTasks: readonly string[];
}

export interface GenerationResult {
  suite: GeneratedSuite;
  tasks: GeneratedTask[];
  displayTask: DisplayTask;
}

export interface SuiteSplitterConfig {
  version: number;
  task: {
    name: string;
    suite?: string;
    buildVariant: string;
    project: string;
    /** Revision and build id locate the archived generator config */
    revision?: string;
    buildId?: string;
    useLargeDistro: boolean;
    largeDistroName?: string;
  };
  split: {
    targetMinutes: number;
    maxSubSuites: number;
    maxTestsPerSuite: number;
    lookbackDays: number;
    createMiscSuite: boolean;
    reduction: CostReductionName;
  };
  resmoke: {
    args: string;
    repeatSuites: number;
    jobsMax?: number;
    suiteDirectory: string;
  };
  timeouts: {
    safetyFactor: number;
    setupOverheadSecs: number;
    idleOverheadSecs: number;
    minTimeoutSecs: number;
    maxTimeoutSecs: number;
    useDefaultTimeouts: boolean;
  };
  multiversion: {
    requiresFcvTag: string;
    tagFile: string;
  };
  stats: {
    apiUrl: string;
    apiUser?: string;
    apiKey?: string;
    timingFile?: string;
  };
  output: {
    directory: string;
    verbose: boolean;
  };
}

export interface CommandOptions {
  config?: string;
  verbose?: boolean;
  dryRun?: boolean;
  timingFile?: string;
  output?: string;
}
