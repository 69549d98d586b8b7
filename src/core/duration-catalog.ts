import fs from 'fs/promises';
import { CostReductionName, DurationSample, LookbackWindow, TestRef } from '../types';
import { ConfigurationError, getErrorMessage } from '../utils/errors';

/**
 * Source of historic run times, keyed by test.
 */
export interface DurationCatalog {
  lookup(test: TestRef): readonly DurationSample[];
}

/**
 * Reduces a test's samples to the single cost used for packing.
 * Never called with an empty list.
 */
export type CostReduction = (durations: readonly number[]) => number;

/**
 * Normalize a test path so stats and suite definitions agree on identity
 * E.g., ".\\jstests\\core\\a.js" -> "jstests/core/a.js"
 */
export function normalizeTestName(test: string): TestRef {
  return test.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

export class InMemoryDurationCatalog implements DurationCatalog {
  private readonly samples = new Map<TestRef, DurationSample[]>();

  constructor(samples: Iterable<DurationSample> = []) {
    for (const sample of samples) {
      this.add(sample);
    }
  }

  add(sample: DurationSample): void {
    if (!Number.isFinite(sample.durationSecs) || sample.durationSecs < 0) {
      return;
    }
    const test = normalizeTestName(sample.test);
    const existing = this.samples.get(test);
    const normalized = { ...sample, test };
    if (existing) {
      existing.push(normalized);
    } else {
      this.samples.set(test, [normalized]);
    }
  }

  lookup(test: TestRef): readonly DurationSample[] {
    return this.samples.get(normalizeTestName(test)) ?? [];
  }

  get size(): number {
    return this.samples.size;
  }
}

export const EMPTY_CATALOG: DurationCatalog = {
  lookup: () => [],
};

export function samplesInWindow(
  samples: readonly DurationSample[],
  window: LookbackWindow,
): DurationSample[] {
  const start = window.start.getTime();
  const end = window.end.getTime();
  return samples.filter(s => {
    const at = s.observedAt.getTime();
    return at >= start && at <= end;
  });
}

export const mean: CostReduction = durations =>
  durations.reduce((sum, d) => sum + d, 0) / durations.length;

export const max: CostReduction = durations => Math.max(...durations);

/**
 * Linear-interpolated percentile, p in [0, 100]
 */
export function percentile(p: number): CostReduction {
  if (p < 0 || p > 100) {
    throw new ConfigurationError(`Percentile must be between 0 and 100, got ${p}`);
  }
  return durations => {
    const sorted = [...durations].sort((a, b) => a - b);
    const index = (sorted.length - 1) * (p / 100);
    const lower = Math.floor(index);
    const upper = Math.ceil(index);
    const lowerVal = sorted[lower] ?? 0;
    const upperVal = sorted[upper] ?? lowerVal;
    return lowerVal + (upperVal - lowerVal) * (index - lower);
  };
}

export const median: CostReduction = percentile(50);

const REDUCTIONS: Record<CostReductionName, CostReduction> = {
  mean,
  median,
  max,
  p90: percentile(90),
};

export function getCostReduction(name: CostReductionName): CostReduction {
  return REDUCTIONS[name];
}

export function isCostReductionName(value: unknown): value is CostReductionName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(REDUCTIONS, value);
}

interface TimingFileEntry {
  duration: number;
  at: string;
}

function isTimingFileEntry(value: unknown): value is TimingFileEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'duration' in value &&
    typeof value.duration === 'number' &&
    'at' in value &&
    typeof value.at === 'string'
  );
}

/**
 * Load an offline timing file:
 * { "version": 1, "tests": { "<test>": [{ "duration": 12.5, "at": "<iso date>" }] } }
 */
export async function loadTimingFile(filePath: string): Promise<InMemoryDurationCatalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError(`Timing file not found: ${filePath}`);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigurationError(`Failed to parse timing file ${filePath}: ${getErrorMessage(err)}`);
  }
  if (!parsed || typeof parsed !== 'object' || !('tests' in parsed)) {
    throw new ConfigurationError(`Timing file ${filePath} has no "tests" section`);
  }
  const { tests } = parsed;
  if (!tests || typeof tests !== 'object') {
    throw new ConfigurationError(`Timing file ${filePath} has no "tests" section`);
  }

  const catalog = new InMemoryDurationCatalog();
  for (const [test, entries] of Object.entries(tests)) {
    if (!Array.isArray(entries)) continue;
    for (const entry of entries) {
      if (!isTimingFileEntry(entry)) continue;
      const observedAt = new Date(entry.at);
      if (Number.isNaN(observedAt.getTime())) continue;
      catalog.add({ test, durationSecs: entry.duration, observedAt });
    }
  }
  return catalog;
}
