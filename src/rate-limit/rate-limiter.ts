import type { OrchestratorConfig } from '../config/schema.js';
import type { SubmissionHistory } from '../state/types.js';

// ============================================================================
// Submission Rate Limiting
// ============================================================================
// Rolling one-hour cap plus a minimum spacing between batch submissions.
// The decision is a pure function of the persisted history and the clock;
// the state store owns every write.

// ---- Config & Types ----

export interface RateLimitConfig {
  maxPerHour: number; // Max submissions in any trailing hour
  minIntervalMinutes: number; // Minimum spacing between two submissions
}

export type RateDecision =
  | { allowed: true; reason: 'OK'; submissionsInWindow: number }
  | { allowed: false; reason: string; waitMinutes: number; submissionsInWindow: number };

export const ONE_HOUR_MS = 3600000;
const ONE_MINUTE_MS = 60000;

/**
 * Map the config file's rate-limit section onto the limiter's config.
 */
export function rateLimitFromConfig(config: OrchestratorConfig): RateLimitConfig {
  return {
    maxPerHour: config.rate_limit.max_batches_per_hour,
    minIntervalMinutes: config.rate_limit.min_batch_interval_minutes,
  };
}

// ---- Window ----

/**
 * Keep only submissions strictly newer than one hour before `now`.
 * Unparseable entries are dropped. Order is preserved.
 */
export function pruneSubmissionTimes(times: readonly string[], now: Date): string[] {
  const cutoff = now.getTime() - ONE_HOUR_MS;
  return times.filter((ts) => {
    const t = Date.parse(ts);
    return !Number.isNaN(t) && t > cutoff;
  });
}

function minutesUntil(targetMs: number, now: Date): number {
  return Math.max(0, Math.ceil((targetMs - now.getTime()) / ONE_MINUTE_MS));
}

// ---- Decision ----

/**
 * Decide whether a batch may be submitted at `now`.
 *
 * The hourly cap is checked before the minimum interval. Reaching the
 * next allowed instant exactly counts as allowed. Wait estimates are
 * rounded up to whole minutes and are only meant for log lines.
 */
export function canSubmit(
  history: SubmissionHistory,
  config: RateLimitConfig,
  now: Date,
): RateDecision {
  const window = pruneSubmissionTimes(history.submissionTimes, now);
  const count = window.length;

  if (count >= config.maxPerHour) {
    const oldest = window.length > 0
      ? Math.min(...window.map((ts) => Date.parse(ts)))
      : now.getTime();
    const waitMinutes = minutesUntil(oldest + ONE_HOUR_MS, now);
    return {
      allowed: false,
      reason: `Rate limit: ${count} batches in last hour. Wait ${waitMinutes} minutes.`,
      waitMinutes,
      submissionsInWindow: count,
    };
  }

  if (history.lastSubmissionTime) {
    const last = Date.parse(history.lastSubmissionTime);
    const nextAllowed = last + config.minIntervalMinutes * ONE_MINUTE_MS;
    if (!Number.isNaN(last) && now.getTime() < nextAllowed) {
      const waitMinutes = minutesUntil(nextAllowed, now);
      return {
        allowed: false,
        reason: `Minimum interval: Wait ${waitMinutes} minutes since last batch.`,
        waitMinutes,
        submissionsInWindow: count,
      };
    }
  }

  return { allowed: true, reason: 'OK', submissionsInWindow: count };
}
