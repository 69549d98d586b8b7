import {
  GeneratedSuite,
  MiscSuite,
  SplitConfig,
  SplitStrategyName,
  SubSuite,
  SuiteSplitParams,
  TestRef,
} from '../types';
import { ConfigurationError } from '../utils/errors';
import { CostReduction, DurationCatalog, mean, samplesInWindow } from './duration-catalog';

/**
 * Emitted for every test that did not fit under the per-suite cap.
 * Informational: the partition still completes.
 */
export interface OverflowPolicyApplied {
  test: TestRef;
  policy: 'misc' | 'appended';
  /** Sub-suite the test was appended to, when policy is 'appended' */
  subSuiteIndex?: number;
}

export interface PartitionOptions {
  createMisc?: boolean;
  /**
   * Tests in the historical suite definition. Anything else is new and goes
   * to the misc suite when one is created.
   */
  knownTests?: Iterable<TestRef>;
  onOverflow?: (event: OverflowPolicyApplied) => void;
}

export interface CostedTest {
  test: TestRef;
  cost: number;
}

interface Bin {
  members: TestRef[];
  cost: number;
  longest: number;
}

interface StrategyContext {
  config: SplitConfig;
  createMisc: boolean;
  overflow: TestRef[];
  onOverflow?: (event: OverflowPolicyApplied) => void;
}

/**
 * Turns a test list into bins. Bins come back in index order.
 */
export interface SplitStrategy {
  readonly name: SplitStrategyName;
  split(tests: readonly CostedTest[], ctx: StrategyContext): Bin[];
}

function newBin(): Bin {
  return { members: [], cost: 0, longest: 0 };
}

function compareTestRefs(a: TestRef, b: TestRef): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Route a test that no bin can take under the cap.
 */
function applyOverflow(bins: Bin[], item: CostedTest, ctx: StrategyContext): void {
  if (ctx.createMisc) {
    ctx.overflow.push(item.test);
    ctx.onOverflow?.({ test: item.test, policy: 'misc' });
    return;
  }

  const lastIndex = bins.length - 1;
  const last = bins[lastIndex];
  last.members.push(item.test);
  last.cost += item.cost;
  last.longest = Math.max(last.longest, item.cost);
  ctx.onOverflow?.({ test: item.test, policy: 'appended', subSuiteIndex: lastIndex });
}

/**
 * Longest Processing Time first: largest cost goes to the least loaded bin
 * that still has room under maxTestsPerSuite.
 */
export const GreedyBalance: SplitStrategy = {
  name: 'greedy',

  split(tests, ctx) {
    const { config } = ctx;
    const sorted = [...tests].sort(
      (a, b) => b.cost - a.cost || compareTestRefs(a.test, b.test),
    );

    const totalCost = sorted.reduce((sum, t) => sum + t.cost, 0);
    const wanted = Math.max(1, Math.ceil(totalCost / config.targetTimePerSuiteSecs));
    const binCount = Math.min(config.maxSubSuites, wanted, sorted.length);

    const bins: Bin[] = Array.from({ length: binCount }, newBin);

    for (const item of sorted) {
      let target: Bin | undefined;
      for (const bin of bins) {
        if (bin.members.length >= config.maxTestsPerSuite) continue;
        if (!target || bin.cost < target.cost) {
          target = bin;
        }
      }

      if (!target && bins.length < config.maxSubSuites) {
        target = newBin();
        bins.push(target);
      }

      if (!target) {
        applyOverflow(bins, item, ctx);
        continue;
      }

      target.members.push(item.test);
      target.cost += item.cost;
      target.longest = Math.max(target.longest, item.cost);
    }

    return bins;
  },
};

/**
 * Deals tests to bins cyclically in input order, ignoring cost.
 */
export const RoundRobin: SplitStrategy = {
  name: 'round-robin',

  split(tests, ctx) {
    const { config } = ctx;
    const binCount = Math.max(
      1,
      Math.min(config.maxSubSuites, Math.ceil(tests.length / config.maxTestsPerSuite)),
    );
    const capacity = binCount * config.maxTestsPerSuite;
    const bins: Bin[] = Array.from({ length: binCount }, newBin);

    tests.forEach((item, index) => {
      if (index >= capacity) {
        applyOverflow(bins, item, ctx);
        return;
      }
      bins[index % binCount].members.push(item.test);
    });

    return bins;
  },
};

/**
 * Greedy only when every test has timing data; mixing known and unknown
 * costs would skew the balance.
 */
export function selectStrategy(costs: ReadonlyArray<number | undefined>): SplitStrategy {
  return costs.every(c => c !== undefined) ? GreedyBalance : RoundRobin;
}

export function validateSplitConfig(config: SplitConfig): void {
  if (!Number.isInteger(config.maxSubSuites) || config.maxSubSuites < 1) {
    throw new ConfigurationError(
      `maxSubSuites must be a positive integer, got ${config.maxSubSuites}`,
    );
  }
  if (!Number.isInteger(config.maxTestsPerSuite) || config.maxTestsPerSuite < 1) {
    throw new ConfigurationError(
      `maxTestsPerSuite must be a positive integer, got ${config.maxTestsPerSuite}`,
    );
  }
  if (!(config.targetTimePerSuiteSecs > 0)) {
    throw new ConfigurationError(
      `targetTimePerSuiteSecs must be positive, got ${config.targetTimePerSuiteSecs}`,
    );
  }
  if (config.lookback.start.getTime() > config.lookback.end.getTime()) {
    throw new ConfigurationError('Lookback window starts after it ends');
  }
}

function dedupe(tests: Iterable<TestRef>): TestRef[] {
  return Array.from(new Set(tests));
}

/**
 * Splits a suite into sub-suites sized by historic run time
 */
export class SuitePartitioner {
  constructor(private readonly reduce: CostReduction = mean) {}

  partition(
    tests: Iterable<TestRef>,
    catalog: DurationCatalog,
    config: SplitConfig,
    params: SuiteSplitParams,
    options: PartitionOptions = {},
  ): GeneratedSuite {
    validateSplitConfig(config);

    const createMisc = options.createMisc ?? false;
    const unique = dedupe(tests);

    if (unique.length === 0) {
      return this.finalize(params, [], undefined, 0, 'round-robin');
    }

    const known = options.knownTests ? new Set(options.knownTests) : undefined;
    const newTests = createMisc && known ? unique.filter(t => !known.has(t)) : [];
    const newTestSet = new Set(newTests);
    const candidates = unique.filter(t => !newTestSet.has(t));

    const costs = candidates.map(test => this.costOf(test, catalog, config));
    const strategy = selectStrategy(costs);
    const costed = candidates.map((test, i) => ({ test, cost: costs[i] ?? 0 }));

    const ctx: StrategyContext = {
      config,
      createMisc,
      overflow: [],
      onOverflow: options.onOverflow,
    };
    const bins = costed.length > 0 ? strategy.split(costed, ctx) : [];

    const hasTimingData = strategy === GreedyBalance;
    const subSuites = bins.map((bin, index): SubSuite => ({
      kind: 'indexed',
      index,
      members: bin.members,
      estimatedCost: hasTimingData ? bin.cost : 0,
      longestTestCost: hasTimingData ? bin.longest : 0,
      hasTimingData,
    }));

    const misc = createMisc
      ? this.buildMisc([...newTests, ...ctx.overflow])
      : undefined;

    return this.finalize(params, subSuites, misc, unique.length, strategy.name);
  }

  private costOf(test: TestRef, catalog: DurationCatalog, config: SplitConfig): number | undefined {
    const samples = samplesInWindow(catalog.lookup(test), config.lookback);
    if (samples.length === 0) {
      return undefined;
    }
    return this.reduce(samples.map(s => s.durationSecs));
  }

  private buildMisc(members: TestRef[]): MiscSuite {
    return Object.freeze({
      kind: 'misc',
      members: Object.freeze(members),
      estimatedCost: 0,
      longestTestCost: 0,
      hasTimingData: false,
    });
  }

  private finalize(
    params: SuiteSplitParams,
    subSuites: SubSuite[],
    misc: MiscSuite | undefined,
    totalTestCount: number,
    strategy: SplitStrategyName,
  ): GeneratedSuite {
    const frozen = subSuites.map(s =>
      Object.freeze({ ...s, members: Object.freeze([...s.members]) }),
    );
    return Object.freeze({
      taskName: params.taskName,
      suiteName: params.suiteName,
      buildVariant: params.buildVariant,
      subSuites: Object.freeze(frozen),
      misc,
      totalTestCount,
      strategy,
    });
  }
}

export interface SplitSummary {
  subSuiteCount: number;
  totalCost: number;
  /** Cost of the longest sub-suite, which bounds the wall-clock time of the run */
  makespan: number;
  /** Even spread of the total cost, or the longest single test if that is larger */
  idealMakespan: number;
  /** idealMakespan / makespan; 1 when no sub-suite runs longer than it must */
  efficiency: number;
  miscTests: number;
  /** Fraction of the suite's tests that run in the misc suite */
  miscShare: number;
}

export function summarizeSplit(suite: GeneratedSuite): SplitSummary {
  const { subSuites } = suite;
  const totalCost = subSuites.reduce((sum, s) => sum + s.estimatedCost, 0);
  const makespan = Math.max(0, ...subSuites.map(s => s.estimatedCost));
  const longestTest = Math.max(0, ...subSuites.map(s => s.longestTestCost));
  const idealMakespan =
    subSuites.length > 0 ? Math.max(totalCost / subSuites.length, longestTest) : 0;
  const miscTests = suite.misc ? suite.misc.members.length : 0;

  return {
    subSuiteCount: subSuites.length,
    totalCost,
    makespan,
    idealMakespan,
    efficiency: makespan > 0 ? idealMakespan / makespan : 1,
    miscTests,
    miscShare: suite.totalTestCount > 0 ? miscTests / suite.totalTestCount : 0,
  };
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/**
 * One line per sub-suite plus the makespan, for --verbose and --dry-run
 */
export function formatSplitSummary(suite: GeneratedSuite): string {
  const summary = summarizeSplit(suite);
  const lines = suite.subSuites.map(s =>
    summary.makespan > 0
      ? `Sub-suite ${s.index}: ${s.estimatedCost.toFixed(1)}s, ${s.members.length} tests (${percent(s.estimatedCost / summary.makespan)} of makespan)`
      : `Sub-suite ${s.index}: ${s.members.length} tests`,
  );

  if (suite.misc) {
    lines.push(`Misc: ${summary.miscTests} tests (${percent(summary.miscShare)} of suite)`);
  }

  lines.push(`Strategy: ${suite.strategy}`);
  lines.push(
    summary.makespan > 0
      ? `Makespan: ${summary.makespan.toFixed(1)}s (ideal ${summary.idealMakespan.toFixed(1)}s, efficiency ${percent(summary.efficiency)})`
      : 'Makespan: unknown without timing data',
  );

  return lines.join('\n');
}
