import { scopedLogger } from "./logger";

const logger = scopedLogger("schedule");

const DAY_MS = 24 * 60 * 60 * 1000;

function parseTime(time: string): { hour: number; minute: number } {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time);
  const hour = match ? Number(match[1]) : NaN;
  const minute = match ? Number(match[2]) : NaN;
  if (!(hour >= 0 && hour < 24 && minute >= 0 && minute < 60)) {
    throw new Error(`Invalid time "${time}" — expected HH:MM`);
  }
  return { hour, minute };
}

/** Milliseconds until the next local HH:MM; a time already passed today rolls to tomorrow. */
export function msUntilNextRun(time: string, now: Date = new Date()): number {
  const { hour, minute } = parseTime(time);
  const next = new Date(now);
  next.setHours(hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return Math.min(next.getTime() - now.getTime(), DAY_MS);
}

export interface ScheduledJob {
  stop(): void;
  nextRunAt(): Date | null;
}

/**
 * Runs `job` every day at the local `time`. A failing run is logged and the
 * next one is still armed.
 */
export function scheduleDaily(time: string, job: () => Promise<void>): ScheduledJob {
  let timer: NodeJS.Timeout | null = null;
  let nextAt: Date | null = null;
  let stopped = false;

  // rejects early on a bad time instead of inside the timer
  msUntilNextRun(time);

  const runOnce = async (): Promise<void> => {
    try {
      await job();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`Scheduled run failed: ${msg}`);
    }
    arm();
  };

  function arm(): void {
    if (stopped) return;
    const wait = msUntilNextRun(time);
    nextAt = new Date(Date.now() + wait);
    logger.info(`Next run scheduled for ${nextAt.toLocaleString()}`);
    timer = setTimeout(() => {
      void runOnce();
    }, wait);
  }

  arm();

  return {
    stop() {
      stopped = true;
      nextAt = null;
      if (timer) clearTimeout(timer);
    },
    nextRunAt() {
      return nextAt;
    },
  };
}
