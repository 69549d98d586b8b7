import {
  AnySubSuite,
  DisplayTask,
  GeneratedSuite,
  GeneratedTask,
  TaskArg,
  TestRef,
} from '../types';
import { SubSuiteIdentity } from './naming';
import { TimeoutEstimator } from './timeout';

export interface ResmokeTaskParams {
  /** Raw resmoke arguments passed through to every generated task */
  resmokeArgs: string;
  repeatSuites?: number;
  /** Directory generated suite files are written to */
  suiteDirectory: string;
}

/**
 * Split a raw argument string into ordered args.
 * "--storageEngine=wiredTiger --jsTestLog foo.js" ->
 * [option storageEngine=wiredTiger, option jsTestLog, positional foo.js]
 */
export function parseArgs(raw: string): TaskArg[] {
  return raw
    .split(/\s+/)
    .filter(token => token.length > 0)
    .map((token): TaskArg => {
      if (!token.startsWith('-')) {
        return { kind: 'positional', value: token };
      }
      const eq = token.indexOf('=');
      if (eq === -1) {
        return { kind: 'option', flag: token };
      }
      return { kind: 'option', flag: token.slice(0, eq), value: token.slice(eq + 1) };
    });
}

export function renderArgs(args: readonly TaskArg[]): string {
  return args
    .map(arg => {
      if (arg.kind === 'positional') return arg.value;
      return arg.value === undefined ? arg.flag : `${arg.flag}=${arg.value}`;
    })
    .join(' ');
}

/**
 * Immutable argument list. Every method returns a new builder, so a shared
 * base can be extended per version mix without copying by hand.
 */
export class TaskArgsBuilder {
  private constructor(private readonly args: readonly TaskArg[]) {}

  static empty(): TaskArgsBuilder {
    return new TaskArgsBuilder([]);
  }

  option(flag: string, value?: string | number): TaskArgsBuilder {
    const arg: TaskArg =
      value === undefined
        ? { kind: 'option', flag }
        : { kind: 'option', flag, value: String(value) };
    return new TaskArgsBuilder([...this.args, arg]);
  }

  raw(raw: string): TaskArgsBuilder {
    return new TaskArgsBuilder([...this.args, ...parseArgs(raw)]);
  }

  /** True if any option flag contains one of the given names */
  mentions(...names: string[]): boolean {
    return this.args.some(arg => arg.kind === 'option' && names.some(n => arg.flag.includes(n)));
  }

  build(): readonly TaskArg[] {
    return Object.freeze([...this.args]);
  }
}

export interface SubTaskTarget {
  subSuite: AnySubSuite;
  taskName: string;
  subSuiteName: string;
}

export function suiteFileLocation(suiteDirectory: string, subSuiteName: string, buildVariant: string): string {
  return `${suiteDirectory}/${subSuiteName}_${buildVariant}.yml`;
}

/**
 * Generates one task per sub-suite, plus the misc suite when present
 */
export class ResmokeTaskGenerator {
  constructor(
    protected readonly identity: SubSuiteIdentity,
    protected readonly estimator: TimeoutEstimator,
  ) {}

  generateTasks(suite: GeneratedSuite, params: ResmokeTaskParams): GeneratedTask[] {
    return this.targets(suite, suite.taskName).map(target =>
      this.createTask(suite, target, this.baseArgs(suite, target, params).build()),
    );
  }

  displayTask(suite: GeneratedSuite, tasks: readonly GeneratedTask[]): DisplayTask {
    return Object.freeze({
      name: suite.taskName,
      executionTasks: Object.freeze(tasks.map(t => t.name).sort()),
    });
  }

  /**
   * Indexed sub-suites in order, then misc
   */
  protected targets(suite: GeneratedSuite, baseName: string): SubTaskTarget[] {
    const total = suite.subSuites.length;
    const targets: SubTaskTarget[] = suite.subSuites.map(subSuite => ({
      subSuite,
      taskName: this.identity.name(baseName, subSuite, total, suite.buildVariant),
      subSuiteName: this.identity.subSuiteName(suite.suiteName, subSuite, total),
    }));

    if (suite.misc) {
      targets.push({
        subSuite: suite.misc,
        taskName: this.identity.miscName(baseName, suite.buildVariant),
        subSuiteName: this.identity.miscSuiteName(suite.suiteName),
      });
    }
    return targets;
  }

  protected baseArgs(
    suite: GeneratedSuite,
    target: SubTaskTarget,
    params: ResmokeTaskParams,
  ): TaskArgsBuilder {
    let args = TaskArgsBuilder.empty()
      .option('--suite', suiteFileLocation(params.suiteDirectory, target.subSuiteName, suite.buildVariant))
      .option('--originSuite', suite.suiteName)
      .raw(params.resmokeArgs);

    if (params.repeatSuites && !args.mentions('repeatSuites', 'repeat')) {
      args = args.option('--repeatSuites', params.repeatSuites);
    }
    return args;
  }

  protected createTask(
    suite: GeneratedSuite,
    target: SubTaskTarget,
    extraArgs: readonly TaskArg[],
    versionMix?: string,
  ): GeneratedTask {
    const excludedTests: TestRef[] =
      target.subSuite.kind === 'misc' ? suite.subSuites.flatMap(s => s.members) : [];

    const task: GeneratedTask = {
      name: target.taskName,
      subSuiteName: target.subSuiteName,
      subSuiteKind: target.subSuite.kind,
      members: target.subSuite.members,
      excludedTests: Object.freeze(excludedTests),
      timeout: this.estimator.estimate(target.subSuite),
      extraArgs,
      ...(versionMix !== undefined ? { versionMix } : {}),
    };
    return Object.freeze(task);
  }
}
