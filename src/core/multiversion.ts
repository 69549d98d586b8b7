import { ClusterTopology, GeneratedSuite, GeneratedTask, VersionMixConfig } from '../types';
import { ResmokeTaskGenerator, ResmokeTaskParams, TaskArgsBuilder } from './task-generator';

export const BACKPORT_REQUIRED_TAG = 'backport_required_multiversion';
export const MULTIVERSION_INCOMPATIBLE_TAG = 'multiversion_incompatible';
export const EXCLUDE_TAGS_FILE = 'multiversion_exclude_tags.yml';

const REPLICA_SET: ClusterTopology = { kind: 'replica-set', nodes: 3, linearChain: true };
const SHARDED: ClusterTopology = { kind: 'sharded', shards: 2, nodesPerShard: 2 };

export const REPL_MIXED_VERSION_CONFIGS: readonly VersionMixConfig[] = [
  { label: 'new-old-new', topology: REPLICA_SET },
  { label: 'new-new-old', topology: REPLICA_SET },
  { label: 'old-new-new', topology: REPLICA_SET },
];

export const SHARDED_MIXED_VERSION_CONFIGS: readonly VersionMixConfig[] = [
  { label: 'new-old-old-new', topology: SHARDED },
];

export function getVersionConfigs(isSharded: boolean): readonly VersionMixConfig[] {
  return isSharded ? SHARDED_MIXED_VERSION_CONFIGS : REPL_MIXED_VERSION_CONFIGS;
}

export interface MultiversionTaskParams extends ResmokeTaskParams {
  /** Parent task; its backport tag is excluded alongside the base set */
  parentTaskName: string;
  /** Always excluded, e.g. the requires-fcv tag of the current release */
  excludeTags: readonly string[];
  tagFile: string;
}

export function topologyArgs(args: TaskArgsBuilder, topology: ClusterTopology): TaskArgsBuilder {
  if (topology.kind === 'sharded') {
    return args
      .option('--numShards', topology.shards)
      .option('--numReplSetNodes', topology.nodesPerShard);
  }
  const withNodes = args.option('--numReplSetNodes', topology.nodes);
  return topology.linearChain ? withNodes.option('--linearChain', 'on') : withNodes;
}

/**
 * Comma separated tag filter: base tags, the generic exclusion tags, then the
 * parent task's backport tag.
 */
export function excludeTagFilter(params: MultiversionTaskParams): string {
  return [
    ...params.excludeTags,
    MULTIVERSION_INCOMPATIBLE_TAG,
    BACKPORT_REQUIRED_TAG,
    `${params.parentTaskName}_${BACKPORT_REQUIRED_TAG}`,
  ].join(',');
}

/**
 * Fans a partitioned suite out over version mixes: one task per
 * (sub-suite, version mix) pair, misc included.
 */
export class MultiversionExpander extends ResmokeTaskGenerator {
  expand(
    suite: GeneratedSuite,
    versionConfigs: readonly VersionMixConfig[],
    params: MultiversionTaskParams,
  ): GeneratedTask[] {
    const tasks: GeneratedTask[] = [];

    for (const versionConfig of versionConfigs) {
      const baseName = `${suite.taskName}_${versionConfig.label}`;

      for (const target of this.targets(suite, baseName)) {
        const args = topologyArgs(
          this.baseArgs(suite, target, params)
            .option('--mixedBinVersions', versionConfig.label)
            .option('--excludeWithAnyTags', excludeTagFilter(params))
            .option('--tagFile', params.tagFile),
          versionConfig.topology,
        );
        tasks.push(this.createTask(suite, target, args.build(), versionConfig.label));
      }
    }

    return tasks;
  }
}
