import { AnySubSuite, TimeoutEstimate } from '../types';
import { ConfigurationError } from '../utils/errors';

export interface TimeoutPolicy {
  /** Multiplier over the summed mean run time, covers machine variance */
  safetyFactor: number;
  /** Fixture startup and teardown */
  setupOverheadSecs: number;
  idleOverheadSecs: number;
  minTimeoutSecs: number;
  maxTimeoutSecs: number;
  /** How many times the suite is repeated within one task */
  repeatFactor: number;
}

export const DEFAULT_TIMEOUT_POLICY: TimeoutPolicy = {
  safetyFactor: 3,
  setupOverheadSecs: 5 * 60,
  idleOverheadSecs: 60,
  minTimeoutSecs: 5 * 60,
  maxTimeoutSecs: 48 * 60 * 60,
  repeatFactor: 1,
};

export const NO_TIMEOUTS: TimeoutEstimate = Object.freeze({ isSpecified: false });

export interface TimeoutCommandVars {
  exec_timeout_secs: number;
  timeout_secs?: number;
}

export class TimeoutEstimator {
  private readonly policy: TimeoutPolicy;

  constructor(policy: Partial<TimeoutPolicy> = {}) {
    this.policy = { ...DEFAULT_TIMEOUT_POLICY, ...policy };
    validateTimeoutPolicy(this.policy);
  }

  estimate(subSuite: AnySubSuite): TimeoutEstimate {
    if (subSuite.kind === 'misc' || !subSuite.hasTimingData) {
      return NO_TIMEOUTS;
    }

    const { safetyFactor, setupOverheadSecs, idleOverheadSecs, repeatFactor } = this.policy;

    const execution =
      Math.ceil(subSuite.estimatedCost * safetyFactor * repeatFactor) + setupOverheadSecs;
    const idle = Math.ceil(subSuite.longestTestCost * safetyFactor) + idleOverheadSecs;

    return Object.freeze({
      isSpecified: true,
      executionTimeoutSecs: this.clamp(execution),
      idleTimeoutSecs: this.clamp(idle),
    });
  }

  private clamp(seconds: number): number {
    return Math.min(this.policy.maxTimeoutSecs, Math.max(this.policy.minTimeoutSecs, seconds));
  }
}

export function validateTimeoutPolicy(policy: TimeoutPolicy): void {
  if (!(policy.safetyFactor > 1)) {
    throw new ConfigurationError(`safetyFactor must be greater than 1, got ${policy.safetyFactor}`);
  }
  if (!(policy.repeatFactor >= 1)) {
    throw new ConfigurationError(`repeatFactor must be at least 1, got ${policy.repeatFactor}`);
  }
  if (policy.setupOverheadSecs < 0 || policy.idleOverheadSecs < 0) {
    throw new ConfigurationError('Timeout overheads cannot be negative');
  }
  if (!(policy.minTimeoutSecs > 0)) {
    throw new ConfigurationError(`minTimeoutSecs must be positive, got ${policy.minTimeoutSecs}`);
  }
  if (policy.maxTimeoutSecs < policy.minTimeoutSecs) {
    throw new ConfigurationError(
      `maxTimeoutSecs (${policy.maxTimeoutSecs}) is below minTimeoutSecs (${policy.minTimeoutSecs})`,
    );
  }
}

/**
 * Variables for the task's timeout update, or undefined to keep the
 * platform defaults.
 */
export function toTimeoutCommand(
  estimate: TimeoutEstimate,
  useDefaultTimeouts = false,
): TimeoutCommandVars | undefined {
  if (useDefaultTimeouts || !estimate.isSpecified || estimate.executionTimeoutSecs === undefined) {
    return undefined;
  }

  const vars: TimeoutCommandVars = { exec_timeout_secs: estimate.executionTimeoutSecs };
  if (estimate.idleTimeoutSecs !== undefined) {
    vars.timeout_secs = estimate.idleTimeoutSecs;
  }
  return vars;
}
