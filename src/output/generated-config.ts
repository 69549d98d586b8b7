import fs from 'fs/promises';
import path from 'path';
import { GEN_SUFFIX } from '../core/naming';
import { renderMiscSuite, renderSubSuite, SuiteDefinition } from '../core/suite-config';
import { renderArgs } from '../core/task-generator';
import { toTimeoutCommand } from '../core/timeout';
import { GeneratedTask, GenerationResult } from '../types';

export const GEN_PARENT_TASK = 'generator_tasks';
export const TASK_DEPENDENCY = 'archive_dist_test_debug';

export interface OutputOptions {
  useDefaultTimeouts: boolean;
  jobsMax?: number;
  requireMultiversion: boolean;
  /** Archived generator config, passed to tasks as gen_task_config_location */
  configLocation?: string;
  runOn?: string[];
}

type Command =
  | { command: string; params: Record<string, unknown> }
  | { func: string; vars?: Record<string, unknown> };

interface TaskConfig {
  name: string;
  commands: Command[];
  depends_on: Array<{ name: string }>;
  run_on?: string[];
}

export interface GeneratedConfigDocument {
  buildvariants: Array<{
    name: string;
    tasks: Array<{ name: string }>;
    display_tasks: Array<{ name: string; execution_tasks: string[] }>;
  }>;
  tasks: TaskConfig[];
}

function renderTask(task: GeneratedTask, options: OutputOptions): TaskConfig {
  const commands: Command[] = [];

  const timeout = toTimeoutCommand(task.timeout, options.useDefaultTimeouts);
  if (timeout) {
    commands.push({ command: 'timeout.update', params: { ...timeout } });
  }

  commands.push({ func: options.requireMultiversion ? 'do multiversion setup' : 'do setup' });

  const vars: Record<string, unknown> = { resmoke_args: renderArgs(task.extraArgs) };
  if (options.configLocation) {
    vars.gen_task_config_location = options.configLocation;
  }
  if (options.jobsMax) {
    vars.resmoke_jobs_max = options.jobsMax;
  }
  commands.push({ func: 'run generated tests', vars });

  const config: TaskConfig = {
    name: task.name,
    commands,
    depends_on: [{ name: TASK_DEPENDENCY }],
  };
  if (options.runOn && options.runOn.length > 0) {
    config.run_on = [...options.runOn];
  }
  return config;
}

export function generateConfigDocument(
  result: GenerationResult,
  options: OutputOptions,
): GeneratedConfigDocument {
  const { suite, tasks, displayTask } = result;
  const sorted = [...tasks].sort((a, b) => a.name.localeCompare(b.name));

  return {
    buildvariants: [
      {
        name: suite.buildVariant,
        tasks: sorted.map(t => ({ name: t.name })),
        display_tasks: [
          { name: displayTask.name, execution_tasks: [...displayTask.executionTasks] },
          { name: GEN_PARENT_TASK, execution_tasks: [`${suite.taskName}${GEN_SUFFIX}`] },
        ],
      },
    ],
    tasks: sorted.map(t => renderTask(t, options)),
  };
}

/**
 * One YAML file per generated suite. Version mixes share a sub-suite's file.
 */
export function generateSuiteFiles(
  result: GenerationResult,
  definition: SuiteDefinition,
): Map<string, string> {
  const files = new Map<string, string>();
  const variant = result.suite.buildVariant;

  for (const task of result.tasks) {
    const fileName = `${task.subSuiteName}_${variant}.yml`;
    if (files.has(fileName)) continue;

    const content =
      task.subSuiteKind === 'misc'
        ? renderMiscSuite(definition, result.suite)
        : renderSubSuite(definition, task.members);
    files.set(fileName, content);
  }

  return files;
}

/**
 * Write the task document and suite files, returning the paths written
 */
export async function writeGeneratedConfig(
  result: GenerationResult,
  definition: SuiteDefinition,
  outputDir: string,
  options: OutputOptions,
): Promise<string[]> {
  const resolved = path.resolve(outputDir);
  await fs.mkdir(resolved, { recursive: true });

  const written: string[] = [];

  const documentPath = path.join(resolved, `${result.suite.taskName}.json`);
  const document = generateConfigDocument(result, options);
  await fs.writeFile(documentPath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
  written.push(documentPath);

  for (const [fileName, content] of generateSuiteFiles(result, definition)) {
    const filePath = path.join(resolved, fileName);
    await fs.writeFile(filePath, content, 'utf-8');
    written.push(filePath);
  }

  return written;
}
