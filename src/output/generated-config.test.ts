import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import yaml from 'yaml';
import {
  generateConfigDocument,
  generateSuiteFiles,
  OutputOptions,
  writeGeneratedConfig,
} from './generated-config';
import { SubSuiteIdentity } from '../core/naming';
import { parseSuiteDefinition } from '../core/suite-config';
import { ResmokeTaskGenerator } from '../core/task-generator';
import { TimeoutEstimator } from '../core/timeout';
import { GeneratedSuite, GenerationResult } from '../types';

const SUITE: GeneratedSuite = {
  taskName: 'jsCore',
  suiteName: 'core',
  buildVariant: 'linux-64',
  subSuites: [
    { kind: 'indexed', index: 0, members: ['jstests/core/a.js'], estimatedCost: 100, longestTestCost: 100, hasTimingData: true },
    { kind: 'indexed', index: 1, members: ['jstests/core/b.js'], estimatedCost: 80, longestTestCost: 80, hasTimingData: true },
  ],
  misc: { kind: 'misc', members: [], estimatedCost: 0, longestTestCost: 0, hasTimingData: false },
  totalTestCount: 2,
  strategy: 'greedy',
};

const DEFINITION = parseSuiteDefinition(
  'core',
  'suites/core.yml',
  'test_kind: js_test\nselector:\n  roots:\n    - jstests/core/*.js\n',
);

const OPTIONS: OutputOptions = { useDefaultTimeouts: false, jobsMax: 4, requireMultiversion: false };

function buildResult(): GenerationResult {
  const generator = new ResmokeTaskGenerator(new SubSuiteIdentity(), new TimeoutEstimator());
  const tasks = generator.generateTasks(SUITE, { resmokeArgs: '--jsTestLog', suiteDirectory: 'generated' });
  return { suite: SUITE, tasks, displayTask: generator.displayTask(SUITE, tasks) };
}

describe('generateConfigDocument', () => {
  it('should list tasks and display tasks for the build variant', () => {
    const document = generateConfigDocument(buildResult(), OPTIONS);

    expect(document.buildvariants).toEqual([
      {
        name: 'linux-64',
        tasks: [
          { name: 'jsCore_0_2_linux-64' },
          { name: 'jsCore_1_2_linux-64' },
          { name: 'jsCore_misc_linux-64' },
        ],
        display_tasks: [
          {
            name: 'jsCore',
            execution_tasks: ['jsCore_0_2_linux-64', 'jsCore_1_2_linux-64', 'jsCore_misc_linux-64'],
          },
          { name: 'generator_tasks', execution_tasks: ['jsCore_gen'] },
        ],
      },
    ]);
  });

  it('should update timeouts before running the generated suite', () => {
    const document = generateConfigDocument(buildResult(), OPTIONS);

    expect(document.tasks[0]).toEqual({
      name: 'jsCore_0_2_linux-64',
      commands: [
        { command: 'timeout.update', params: { exec_timeout_secs: 600, timeout_secs: 360 } },
        { func: 'do setup' },
        {
          func: 'run generated tests',
          vars: {
            resmoke_args: '--suite=generated/core_0_2_linux-64.yml --originSuite=core --jsTestLog',
            resmoke_jobs_max: 4,
          },
        },
      ],
      depends_on: [{ name: 'archive_dist_test_debug' }],
    });
  });

  it('should keep platform timeouts for misc and when defaults are forced', () => {
    const document = generateConfigDocument(buildResult(), OPTIONS);
    const forced = generateConfigDocument(buildResult(), { ...OPTIONS, useDefaultTimeouts: true });

    expect(document.tasks[2].commands[0]).toEqual({ func: 'do setup' });
    expect(forced.tasks[0].commands[0]).toEqual({ func: 'do setup' });
  });

  it('should pass the archived config location and target distro', () => {
    const document = generateConfigDocument(buildResult(), {
      ...OPTIONS,
      configLocation: 'linux-64/abc123/generate_tasks/jsCore_gen-b42.tgz',
      runOn: ['rhel80-large'],
    });

    expect(document.tasks[0].run_on).toEqual(['rhel80-large']);
    expect(document.tasks[0].commands[2]).toEqual({
      func: 'run generated tests',
      vars: {
        resmoke_args: '--suite=generated/core_0_2_linux-64.yml --originSuite=core --jsTestLog',
        gen_task_config_location: 'linux-64/abc123/generate_tasks/jsCore_gen-b42.tgz',
        resmoke_jobs_max: 4,
      },
    });
    expect(generateConfigDocument(buildResult(), OPTIONS).tasks[0]).not.toHaveProperty('run_on');
  });

  it('should use the multiversion setup when required', () => {
    const document = generateConfigDocument(buildResult(), {
      useDefaultTimeouts: true,
      requireMultiversion: true,
    });

    expect(document.tasks[0].commands).toEqual([
      { func: 'do multiversion setup' },
      {
        func: 'run generated tests',
        vars: { resmoke_args: '--suite=generated/core_0_2_linux-64.yml --originSuite=core --jsTestLog' },
      },
    ]);
  });
});

describe('generateSuiteFiles', () => {
  it('should write one suite file per sub-suite and misc', () => {
    const files = generateSuiteFiles(buildResult(), DEFINITION);

    expect([...files.keys()]).toEqual([
      'core_0_2_linux-64.yml',
      'core_1_2_linux-64.yml',
      'core_misc_linux-64.yml',
    ]);
    expect(yaml.parse(files.get('core_1_2_linux-64.yml') ?? '').selector).toEqual({
      roots: ['jstests/core/b.js'],
    });
    expect(yaml.parse(files.get('core_misc_linux-64.yml') ?? '').selector).toEqual({
      roots: ['jstests/core/*.js'],
      exclude_files: ['jstests/core/a.js', 'jstests/core/b.js'],
    });
  });
});

describe('writeGeneratedConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suite-splitter-output-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write the task document and suite files', async () => {
    const outputDir = path.join(tmpDir, 'generated');
    const result = buildResult();

    const written = await writeGeneratedConfig(result, DEFINITION, outputDir, OPTIONS);

    expect(written.map(f => path.basename(f))).toEqual([
      'jsCore.json',
      'core_0_2_linux-64.yml',
      'core_1_2_linux-64.yml',
      'core_misc_linux-64.yml',
    ]);
    const document = JSON.parse(await fs.readFile(path.join(outputDir, 'jsCore.json'), 'utf-8'));
    expect(document).toEqual(generateConfigDocument(result, OPTIONS));
  });
});
