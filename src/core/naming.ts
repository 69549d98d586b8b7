import path from 'path';
import { SubSuite } from '../types';

export const GEN_SUFFIX = '_gen';
export const MISC_SUFFIX = 'misc';

/**
 * "jsCore_gen" -> "jsCore"
 */
export function removeGenSuffix(taskName: string): string {
  return taskName.endsWith(GEN_SUFFIX) ? taskName.slice(0, -GEN_SUFFIX.length) : taskName;
}

/**
 * "buildscripts/resmokeconfig/suites/core.yml" -> "core"
 */
export function suiteBaseName(suiteName: string): string {
  return path.posix.basename(suiteName.replace(/\\/g, '/')).replace(/\.ya?ml$/, '');
}

/**
 * Deterministic names for generated sub-suites. Names embed the total count,
 * so a different number of sub-suites renames every one of them.
 */
export class SubSuiteIdentity {
  /** <base>_<index>_<total>_<variant> */
  name(baseName: string, subSuite: SubSuite, total: number, buildVariant: string): string {
    return `${baseName}_${this.indexPart(subSuite.index, total)}_${buildVariant}`;
  }

  /** <suite>_<index>_<total>, used for the generated suite file */
  subSuiteName(originSuite: string, subSuite: SubSuite, total: number): string {
    return `${suiteBaseName(originSuite)}_${this.indexPart(subSuite.index, total)}`;
  }

  miscName(baseName: string, buildVariant: string): string {
    return `${baseName}_${MISC_SUFFIX}_${buildVariant}`;
  }

  miscSuiteName(originSuite: string): string {
    return `${suiteBaseName(originSuite)}_${MISC_SUFFIX}`;
  }

  private indexPart(index: number, total: number): string {
    const width = String(Math.max(total - 1, 0)).length;
    return `${String(index).padStart(width, '0')}_${total}`;
  }
}
