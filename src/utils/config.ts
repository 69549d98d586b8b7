import fs from 'fs/promises';
import yaml from 'yaml';
import { isCostReductionName } from '../core/duration-catalog';
import { EXCLUDE_TAGS_FILE } from '../core/multiversion';
import { GEN_SUFFIX, removeGenSuffix } from '../core/naming';
import { TimeoutPolicy } from '../core/timeout';
import { SplitConfig, SuiteSplitterConfig } from '../types';
import { ConfigurationError, getErrorMessage } from './errors';

export const DEFAULT_CONFIG_FILE = '.suite-splitter.yml';

export const DEFAULT_CONFIG: SuiteSplitterConfig = {
  version: 1,
  task: {
    name: 'jsCore_gen',
    suite: undefined,
    buildVariant: 'linux-64',
    project: 'my-project',
    useLargeDistro: false,
  },
  split: {
    targetMinutes: 60,
    maxSubSuites: 5,
    maxTestsPerSuite: 100,
    lookbackDays: 14,
    createMiscSuite: true,
    reduction: 'mean',
  },
  resmoke: {
    args: '',
    repeatSuites: 1,
    suiteDirectory: 'buildscripts/resmokeconfig/suites',
  },
  timeouts: {
    safetyFactor: 3,
    setupOverheadSecs: 300,
    idleOverheadSecs: 60,
    minTimeoutSecs: 300,
    maxTimeoutSecs: 48 * 60 * 60,
    useDefaultTimeouts: false,
  },
  multiversion: {
    requiresFcvTag: 'requires_fcv_latest',
    tagFile: EXCLUDE_TAGS_FILE,
  },
  stats: {
    apiUrl: process.env.EVERGREEN_API_URL || 'https://evergreen.mongodb.com',
    apiUser: process.env.EVERGREEN_API_USER,
    apiKey: process.env.EVERGREEN_API_KEY,
  },
  output: {
    directory: 'generated_resmoke_config',
    verbose: false,
  },
};

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed reads from one YAML section, falling back to defaults for absent keys
 */
class SectionReader {
  constructor(
    private readonly name: string,
    private readonly values: Section,
  ) {}

  static of(doc: Section, name: string): SectionReader {
    const value = doc[name];
    if (value === undefined || value === null) {
      return new SectionReader(name, {});
    }
    if (!isRecord(value)) {
      throw new ConfigurationError(`Config section "${name}" must be a mapping`);
    }
    return new SectionReader(name, value);
  }

  string(key: string, fallback: string): string {
    return this.optionalString(key) ?? fallback;
  }

  optionalString(key: string, fallback?: string): string | undefined {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string') throw this.typeError(key, 'a string');
    return value;
  }

  number(key: string, fallback: number): number {
    return this.optionalNumber(key) ?? fallback;
  }

  optionalNumber(key: string, fallback?: number): number | undefined {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || Number.isNaN(value)) throw this.typeError(key, 'a number');
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.values[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'boolean') throw this.typeError(key, 'true or false');
    return value;
  }

  private typeError(key: string, expected: string): ConfigurationError {
    return new ConfigurationError(`Config value ${this.name}.${key} must be ${expected}`);
  }
}

export function parseConfig(content: string): SuiteSplitterConfig {
  const parsed: unknown = yaml.parse(content);
  const doc: unknown = parsed ?? {};
  if (!isRecord(doc)) {
    throw new ConfigurationError('Config file must be a YAML mapping');
  }

  const d = DEFAULT_CONFIG;
  const task = SectionReader.of(doc, 'task');
  const split = SectionReader.of(doc, 'split');
  const resmoke = SectionReader.of(doc, 'resmoke');
  const timeouts = SectionReader.of(doc, 'timeouts');
  const multiversion = SectionReader.of(doc, 'multiversion');
  const stats = SectionReader.of(doc, 'stats');
  const output = SectionReader.of(doc, 'output');

  const reduction = split.string('reduction', d.split.reduction);
  if (!isCostReductionName(reduction)) {
    throw new ConfigurationError(
      `Config value split.reduction must be one of mean, median, max, p90; got "${reduction}"`,
    );
  }

  return {
    version: typeof doc.version === 'number' ? doc.version : d.version,
    task: {
      name: task.string('name', d.task.name),
      suite: task.optionalString('suite', d.task.suite),
      buildVariant: task.string('buildVariant', d.task.buildVariant),
      project: task.string('project', d.task.project),
      revision: task.optionalString('revision', d.task.revision),
      buildId: task.optionalString('buildId', d.task.buildId),
      useLargeDistro: task.boolean('useLargeDistro', d.task.useLargeDistro),
      largeDistroName: task.optionalString('largeDistroName', d.task.largeDistroName),
    },
    split: {
      targetMinutes: split.number('targetMinutes', d.split.targetMinutes),
      maxSubSuites: split.number('maxSubSuites', d.split.maxSubSuites),
      maxTestsPerSuite: split.number('maxTestsPerSuite', d.split.maxTestsPerSuite),
      lookbackDays: split.number('lookbackDays', d.split.lookbackDays),
      createMiscSuite: split.boolean('createMiscSuite', d.split.createMiscSuite),
      reduction,
    },
    resmoke: {
      args: resmoke.string('args', d.resmoke.args),
      repeatSuites: resmoke.number('repeatSuites', d.resmoke.repeatSuites),
      jobsMax: resmoke.optionalNumber('jobsMax', d.resmoke.jobsMax),
      suiteDirectory: resmoke.string('suiteDirectory', d.resmoke.suiteDirectory),
    },
    timeouts: {
      safetyFactor: timeouts.number('safetyFactor', d.timeouts.safetyFactor),
      setupOverheadSecs: timeouts.number('setupOverheadSecs', d.timeouts.setupOverheadSecs),
      idleOverheadSecs: timeouts.number('idleOverheadSecs', d.timeouts.idleOverheadSecs),
      minTimeoutSecs: timeouts.number('minTimeoutSecs', d.timeouts.minTimeoutSecs),
      maxTimeoutSecs: timeouts.number('maxTimeoutSecs', d.timeouts.maxTimeoutSecs),
      useDefaultTimeouts: timeouts.boolean('useDefaultTimeouts', d.timeouts.useDefaultTimeouts),
    },
    multiversion: {
      requiresFcvTag: multiversion.string('requiresFcvTag', d.multiversion.requiresFcvTag),
      tagFile: multiversion.string('tagFile', d.multiversion.tagFile),
    },
    stats: {
      apiUrl: stats.string('apiUrl', d.stats.apiUrl),
      apiUser: stats.optionalString('apiUser', d.stats.apiUser),
      apiKey: stats.optionalString('apiKey', d.stats.apiKey),
      timingFile: stats.optionalString('timingFile', d.stats.timingFile),
    },
    output: {
      directory: output.string('directory', d.output.directory),
      verbose: output.boolean('verbose', d.output.verbose),
    },
  };
}

export async function loadConfig(configPath: string): Promise<SuiteSplitterConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError(
        `Config file not found: ${configPath}\nRun 'suite-splitter init' to create one.`
      );
    }
    throw new ConfigurationError(`Failed to load config: ${getErrorMessage(err)}`);
  }

  try {
    return parseConfig(content);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Failed to parse ${configPath}: ${getErrorMessage(err)}`);
  }
}

export async function saveConfig(
  configPath: string,
  config: SuiteSplitterConfig,
  force = false
): Promise<void> {
  const exists = await fs.access(configPath).then(() => true).catch(() => false);

  if (exists && !force) {
    throw new ConfigurationError(
      `Config file already exists: ${configPath}\nUse --force to overwrite.`
    );
  }

  // Credentials stay in the environment
  const { apiUser: _user, apiKey: _key, ...stats } = config.stats;
  const content = yaml.stringify({ ...config, stats });
  await fs.writeFile(configPath, content, 'utf-8');
}

export function validateConfig(config: SuiteSplitterConfig): string[] {
  const errors: string[] = [];

  if (!config.task.name) {
    errors.push('Task name is required');
  }

  if (!config.task.buildVariant) {
    errors.push('Build variant is required');
  }

  if (!config.task.project) {
    errors.push('Project is required');
  }

  if (config.task.useLargeDistro && !config.task.largeDistroName) {
    errors.push('task.largeDistroName is required when task.useLargeDistro is set');
  }

  if (!Number.isInteger(config.split.maxSubSuites) || config.split.maxSubSuites < 1) {
    errors.push('split.maxSubSuites must be a positive integer');
  }

  if (!Number.isInteger(config.split.maxTestsPerSuite) || config.split.maxTestsPerSuite < 1) {
    errors.push('split.maxTestsPerSuite must be a positive integer');
  }

  if (config.split.targetMinutes <= 0) {
    errors.push('split.targetMinutes must be positive');
  }

  if (config.split.lookbackDays <= 0) {
    errors.push('split.lookbackDays must be positive');
  }

  if (config.resmoke.repeatSuites < 1) {
    errors.push('resmoke.repeatSuites must be at least 1');
  }

  if (config.timeouts.safetyFactor <= 1) {
    errors.push('timeouts.safetyFactor must be greater than 1');
  }

  if (config.timeouts.maxTimeoutSecs < config.timeouts.minTimeoutSecs) {
    errors.push('timeouts.maxTimeoutSecs must not be below timeouts.minTimeoutSecs');
  }

  return errors;
}

export async function findConfigFile(): Promise<string | null> {
  const possiblePaths = [
    DEFAULT_CONFIG_FILE,
    '.suite-splitter.yaml',
    'suite-splitter.yml',
    'suite-splitter.yaml',
  ];

  for (const p of possiblePaths) {
    try {
      await fs.access(p);
      return p;
    } catch {
      continue;
    }
  }

  return null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Split settings for a run at `now`. The lookback window ends at `now`
 * truncated to whole seconds and starts at 00:00Z of its first day, since
 * daily stats are stamped at midnight.
 */
export function getSplitConfig(config: SuiteSplitterConfig, now: Date = new Date()): SplitConfig {
  const end = new Date(Math.floor(now.getTime() / 1000) * 1000);
  const firstDay = end.getTime() - config.split.lookbackDays * DAY_MS;
  const start = new Date(Math.floor(firstDay / DAY_MS) * DAY_MS);

  return {
    targetTimePerSuiteSecs: config.split.targetMinutes * 60,
    maxSubSuites: config.split.maxSubSuites,
    maxTestsPerSuite: config.split.maxTestsPerSuite,
    lookback: { start, end },
  };
}

export function getTimeoutPolicy(config: SuiteSplitterConfig): TimeoutPolicy {
  return {
    safetyFactor: config.timeouts.safetyFactor,
    setupOverheadSecs: config.timeouts.setupOverheadSecs,
    idleOverheadSecs: config.timeouts.idleOverheadSecs,
    minTimeoutSecs: config.timeouts.minTimeoutSecs,
    maxTimeoutSecs: config.timeouts.maxTimeoutSecs,
    repeatFactor: config.resmoke.repeatSuites,
  };
}

/**
 * Task name without its "_gen" suffix
 */
export function getTaskName(config: SuiteSplitterConfig): string {
  return removeGenSuffix(config.task.name);
}

export function getSuiteName(config: SuiteSplitterConfig): string {
  return config.task.suite || getTaskName(config);
}

/**
 * Where the generator's archived config lives:
 * <variant>/<revision>/generate_tasks/<task>_gen-<buildId>.tgz
 */
export function getConfigLocation(config: SuiteSplitterConfig): string | undefined {
  const { revision, buildId, buildVariant } = config.task;
  if (!revision || !buildId) {
    return undefined;
  }
  return `${buildVariant}/${revision}/generate_tasks/${getTaskName(config)}${GEN_SUFFIX}-${buildId}.tgz`;
}

/**
 * Distros generated tasks run on, or undefined for the variant's default
 */
export function getRunOn(config: SuiteSplitterConfig): string[] | undefined {
  const { useLargeDistro, largeDistroName } = config.task;
  return useLargeDistro && largeDistroName ? [largeDistroName] : undefined;
}
