/**
 * Vetting Bot — src/scheduler/staffRatingScheduler.ts
 * WHAT: Weekly timer for the automatic staff rating post (Sundays 21:00 UTC).
 * WHY: Servers with auto_post enabled get the poll without anyone running /post_rating.
 * FLOWS:
 *  - start → setTimeout(until next Sunday 21:00 UTC) → run() → re-arm for the week after
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { runWithCtx } from "../lib/reqctx.js";

export type WeeklySlot = {
  /** 0 = Sunday, as Date#getUTCDay */
  weekday: number;
  hour: number;
  minute: number;
};

export const STAFF_RATING_SLOT: WeeklySlot = { weekday: 0, hour: 21, minute: 0 };

const WEEK_MS = 7 * 86_400_000;

let _activeTimer: NodeJS.Timeout | null = null;
// Bumped on every start/stop so a run that finishes after stop() does not re-arm.
let _generation = 0;

/**
 * First occurrence of the slot strictly after `now`, in UTC.
 */
export function nextWeeklyRun(now: Date, slot: WeeklySlot = STAFF_RATING_SLOT): Date {
  const candidate = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), slot.hour, slot.minute, 0, 0)
  );
  const daysAhead = (slot.weekday - now.getUTCDay() + 7) % 7;
  candidate.setUTCDate(candidate.getUTCDate() + daysAhead);
  if (candidate.getTime() <= now.getTime()) {
    return new Date(candidate.getTime() + WEEK_MS);
  }
  return candidate;
}

export type StaffRatingSchedulerOptions = {
  /** Posts to every auto_post server; errors are logged, not rethrown */
  run: () => Promise<void>;
  disabled?: boolean;
  now?: () => Date;
};

/**
 * WHAT: Arm the weekly timer. Calling it again replaces the previous timer.
 *
 * @example
 * // In src/index.ts ClientReady event:
 * startStaffRatingScheduler({ run: () => postToAutoPostServers(services) });
 */
export function startStaffRatingScheduler(options: StaffRatingSchedulerOptions): void {
  if (options.disabled) {
    logger.debug("[staffRating:scheduler] scheduler disabled via env flag");
    return;
  }

  stopStaffRatingScheduler();
  const generation = ++_generation;
  const now = options.now ?? (() => new Date());

  const arm = () => {
    if (generation !== _generation) return;
    const at = nextWeeklyRun(now());
    const delay = Math.max(at.getTime() - now().getTime(), 0);
    logger.info({ nextRun: at.toISOString() }, "[staffRating:scheduler] next automatic post scheduled");

    const timer = setTimeout(() => {
      void runWithCtx({ kind: "scheduler", cmd: "staff_rating_auto_post" }, async () => {
        try {
          await options.run();
        } catch (err) {
          logger.error({ err }, "[staffRating:scheduler] automatic post failed");
        }
      }).finally(arm);
    }, delay);
    // Never keep the process alive for a timer a week away.
    timer.unref();
    _activeTimer = timer;
  };

  arm();
}

export function stopStaffRatingScheduler(): void {
  _generation++;
  if (_activeTimer) {
    clearTimeout(_activeTimer);
    _activeTimer = null;
    logger.info("[staffRating:scheduler] scheduler stopped");
  }
}
