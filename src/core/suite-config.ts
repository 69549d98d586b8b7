import { glob } from 'glob';
import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { GeneratedSuite, TestRef } from '../types';
import { ConfigurationError } from '../utils/errors';
import { normalizeTestName } from './duration-catalog';

export const SHARDED_FIXTURE = 'ShardedClusterFixture';

/**
 * A resmoke suite definition, as read from its YAML file
 */
export interface SuiteDefinition {
  name: string;
  filePath: string;
  testKind?: string;
  roots: string[];
  excludeFiles: string[];
  fixtureClass?: string;
  /** Full parsed document, kept so generated suites carry every other setting */
  raw: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string, filePath: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigurationError(`${field} in ${filePath} must be a list of strings`);
  }
  return value;
}

export function suiteFilePath(suiteDirectory: string, suiteName: string): string {
  return /\.ya?ml$/.test(suiteName)
    ? path.resolve(suiteName)
    : path.resolve(suiteDirectory, `${suiteName}.yml`);
}

export function parseSuiteDefinition(name: string, filePath: string, content: string): SuiteDefinition {
  const doc: unknown = yaml.parse(content);
  if (!isRecord(doc)) {
    throw new ConfigurationError(`Suite file ${filePath} is not a YAML mapping`);
  }

  const selector = isRecord(doc.selector) ? doc.selector : {};
  const executor = isRecord(doc.executor) ? doc.executor : {};
  const fixture = isRecord(executor.fixture) ? executor.fixture : {};

  return {
    name,
    filePath,
    testKind: typeof doc.test_kind === 'string' ? doc.test_kind : undefined,
    roots: stringList(selector.roots, 'selector.roots', filePath),
    excludeFiles: stringList(selector.exclude_files, 'selector.exclude_files', filePath),
    fixtureClass: typeof fixture.class === 'string' ? fixture.class : undefined,
    raw: doc,
  };
}

export async function loadSuiteDefinition(
  suiteDirectory: string,
  suiteName: string,
): Promise<SuiteDefinition> {
  const filePath = suiteFilePath(suiteDirectory, suiteName);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError(`Suite file not found: ${filePath}`);
    }
    throw err;
  }

  return parseSuiteDefinition(suiteName, filePath, content);
}

/**
 * Expand the suite's roots into its test list, relative to rootDir
 */
export async function resolveTests(definition: SuiteDefinition, rootDir: string): Promise<TestRef[]> {
  if (definition.roots.length === 0) {
    return [];
  }

  const files = await glob(definition.roots, {
    cwd: rootDir,
    ignore: definition.excludeFiles,
    nodir: true,
    posix: true,
  });

  // Sort by path for consistent ordering
  return Array.from(new Set(files.map(normalizeTestName))).sort();
}

export function isSuiteSharded(definition: SuiteDefinition): boolean {
  return definition.fixtureClass === SHARDED_FIXTURE;
}

function withSelector(
  definition: SuiteDefinition,
  roots: readonly string[],
  excludeFiles: readonly string[],
): Record<string, unknown> {
  const selector: Record<string, unknown> = isRecord(definition.raw.selector)
    ? { ...definition.raw.selector }
    : {};
  selector.roots = [...roots];
  if (excludeFiles.length > 0) {
    selector.exclude_files = [...excludeFiles];
  } else {
    delete selector.exclude_files;
  }
  return { ...definition.raw, selector };
}

/**
 * Suite YAML for one indexed sub-suite: its members are the roots
 */
export function renderSubSuite(definition: SuiteDefinition, members: readonly TestRef[]): string {
  return yaml.stringify(withSelector(definition, members, []));
}

/**
 * Suite YAML for the misc suite: the origin roots minus everything already
 * assigned to an indexed sub-suite, so tests added later still run.
 */
export function renderMiscSuite(definition: SuiteDefinition, suite: GeneratedSuite): string {
  const assigned = suite.subSuites.flatMap(s => s.members);
  return yaml.stringify(
    withSelector(definition, definition.roots, [...definition.excludeFiles, ...assigned]),
  );
}
