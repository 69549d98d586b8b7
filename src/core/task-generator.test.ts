import { parseArgs, renderArgs, ResmokeTaskGenerator, ResmokeTaskParams, TaskArgsBuilder } from './task-generator';
import { SubSuiteIdentity } from './naming';
import { NO_TIMEOUTS, TimeoutEstimator } from './timeout';
import { GeneratedSuite } from '../types';

const SUITE: GeneratedSuite = {
  taskName: 'jsCore',
  suiteName: 'core',
  buildVariant: 'linux-64',
  subSuites: [
    { kind: 'indexed', index: 0, members: ['a.js', 'b.js'], estimatedCost: 100, longestTestCost: 60, hasTimingData: true },
    { kind: 'indexed', index: 1, members: ['c.js'], estimatedCost: 90, longestTestCost: 90, hasTimingData: true },
  ],
  misc: { kind: 'misc', members: ['d.js'], estimatedCost: 0, longestTestCost: 0, hasTimingData: false },
  totalTestCount: 4,
  strategy: 'greedy',
};

const PARAMS: ResmokeTaskParams = {
  resmokeArgs: '--storageEngine=wiredTiger --jsTestLog',
  repeatSuites: 2,
  suiteDirectory: 'generated',
};

describe('parseArgs', () => {
  it('should split options, values and positionals', () => {
    expect(parseArgs(' --storageEngine=wiredTiger  --jsTestLog jstests/a.js -v ')).toEqual([
      { kind: 'option', flag: '--storageEngine', value: 'wiredTiger' },
      { kind: 'option', flag: '--jsTestLog' },
      { kind: 'positional', value: 'jstests/a.js' },
      { kind: 'option', flag: '-v' },
    ]);
  });

  it('should split on the first equals sign only', () => {
    expect(parseArgs('--mongodSetParameters={a=1}')).toEqual([
      { kind: 'option', flag: '--mongodSetParameters', value: '{a=1}' },
    ]);
  });

  it('should return nothing for blank input', () => {
    expect(parseArgs('   ')).toEqual([]);
  });

  it('should render parsed args back to a single string', () => {
    expect(renderArgs(parseArgs('--a=1 --b c'))).toBe('--a=1 --b c');
  });
});

describe('TaskArgsBuilder', () => {
  it('should leave the original builder untouched', () => {
    const base = TaskArgsBuilder.empty().option('--suite', 'core');
    const extended = base.option('--numShards', 2);

    expect(renderArgs(base.build())).toBe('--suite=core');
    expect(renderArgs(extended.build())).toBe('--suite=core --numShards=2');
  });

  it('should detect flags by name', () => {
    const args = TaskArgsBuilder.empty().raw('--repeatSuites=3 tests.js');

    expect(args.mentions('repeat')).toBe(true);
    expect(args.mentions('tests.js')).toBe(false);
  });

  it('should build a frozen list', () => {
    expect(Object.isFrozen(TaskArgsBuilder.empty().option('--x').build())).toBe(true);
  });
});

describe('ResmokeTaskGenerator', () => {
  let generator: ResmokeTaskGenerator;

  beforeEach(() => {
    generator = new ResmokeTaskGenerator(new SubSuiteIdentity(), new TimeoutEstimator());
  });

  it('should create one task per sub-suite plus misc', () => {
    const tasks = generator.generateTasks(SUITE, PARAMS);

    expect(tasks.map(t => t.name)).toEqual([
      'jsCore_0_2_linux-64',
      'jsCore_1_2_linux-64',
      'jsCore_misc_linux-64',
    ]);
    expect(tasks.map(t => t.subSuiteName)).toEqual(['core_0_2', 'core_1_2', 'core_misc']);
    expect(tasks.map(t => t.subSuiteKind)).toEqual(['indexed', 'indexed', 'misc']);
  });

  it('should point each task at its generated suite file', () => {
    const [first] = generator.generateTasks(SUITE, PARAMS);

    expect(renderArgs(first.extraArgs)).toBe(
      '--suite=generated/core_0_2_linux-64.yml --originSuite=core --storageEngine=wiredTiger --jsTestLog --repeatSuites=2',
    );
  });

  it('should not add repeatSuites when the raw args already repeat', () => {
    const [first] = generator.generateTasks(SUITE, { ...PARAMS, resmokeArgs: '--repeatSuites=5' });

    expect(renderArgs(first.extraArgs)).toBe(
      '--suite=generated/core_0_2_linux-64.yml --originSuite=core --repeatSuites=5',
    );
  });

  it('should estimate timeouts for indexed sub-suites only', () => {
    const [first, , misc] = generator.generateTasks(SUITE, PARAMS);

    // 100 * 3 + 300; 60 * 3 + 60 raised to the 300s minimum
    expect(first.timeout).toEqual({ isSpecified: true, executionTimeoutSecs: 600, idleTimeoutSecs: 300 });
    expect(misc.timeout).toBe(NO_TIMEOUTS);
  });

  it('should exclude every assigned test from the misc task', () => {
    const tasks = generator.generateTasks(SUITE, PARAMS);

    expect(tasks[2].members).toEqual(['d.js']);
    expect(tasks[2].excludedTests).toEqual(['a.js', 'b.js', 'c.js']);
    expect(tasks[0].excludedTests).toEqual([]);
  });

  it('should skip the misc task when there is no misc suite', () => {
    const tasks = generator.generateTasks({ ...SUITE, misc: undefined }, PARAMS);

    expect(tasks).toHaveLength(2);
  });

  it('should group tasks under a display task', () => {
    const tasks = generator.generateTasks(SUITE, PARAMS);

    const display = generator.displayTask(SUITE, [...tasks].reverse());

    expect(display).toEqual({
      name: 'jsCore',
      executionTasks: ['jsCore_0_2_linux-64', 'jsCore_1_2_linux-64', 'jsCore_misc_linux-64'],
    });
  });
});
