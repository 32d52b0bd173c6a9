// src/services/scheduler.ts
import { Cron } from "croner";
import type { UserId } from "../contracts/events.js";
import type { DayFilter, ScheduleSpec } from "../contracts/schedule.js";
import type { PracticeStorage } from "../db/storage.js";
import { safeString } from "../server_safe_string.js";

export type ReminderJob = {
  id: string;
  userId: UserId;
  time: string;
  dayFilter: DayFilter;
  timezone: string;
  pattern: string;
  nextRun: Date | null;
};

const DAY_OF_WEEK: Record<DayFilter, string> = {
  all: "*",
  weekdays: "1-5",
  weekends: "0,6",
};

/** "HH:MM" plus a day filter → five-field cron pattern. */
export function cronPatternFor(time: string, dayFilter: DayFilter): string {
  const [hour, minute] = time.split(":").map((part) => Number(part));
  return `${minute} ${hour} * * ${DAY_OF_WEEK[dayFilter]}`;
}

export function jobIdFor(userId: UserId, time: string): string {
  return `reminder_${userId}_${time.replace(":", "")}`;
}

export function isValidTimeZone(zone: string): boolean {
  if (!zone.trim()) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

type ScheduledCron = { job: Cron; time: string; dayFilter: DayFilter; timezone: string };

export type ReminderSchedulerOptions = {
  onReminder: (userId: UserId) => void | Promise<void>;
};

/**
 * One cron job per reminder time, evaluated in the schedule's own zone.
 * Rescheduling a user replaces all of their jobs.
 */
export class ReminderScheduler {
  private readonly jobs = new Map<UserId, ScheduledCron[]>();

  constructor(private readonly options: ReminderSchedulerOptions) {}

  scheduleForUser(userId: UserId, schedule: ScheduleSpec): number {
    this.cancelForUser(userId);
    if (!isValidTimeZone(schedule.timezone)) {
      console.error(`[scheduler] invalid timezone ${schedule.timezone} for user ${userId}`);
      return 0;
    }

    const scheduled: ScheduledCron[] = [];
    for (const time of schedule.times) {
      const pattern = cronPatternFor(time, schedule.day_filter);
      const job = new Cron(
        pattern,
        {
          name: jobIdFor(userId, time),
          timezone: schedule.timezone,
          unref: true,
          catch: (err: unknown) => console.error(`[scheduler] reminder for ${userId} failed`, safeString(err)),
        },
        () => this.fire(userId, time)
      );
      scheduled.push({ job, time, dayFilter: schedule.day_filter, timezone: schedule.timezone });
    }
    this.jobs.set(userId, scheduled);
    console.log(
      `[scheduler] scheduled ${scheduled.length} reminder(s) for user ${userId}: ${schedule.times.join(", ")} ${schedule.day_filter} ${schedule.timezone}`
    );
    return scheduled.length;
  }

  cancelForUser(userId: UserId): number {
    const existing = this.jobs.get(userId);
    if (!existing) return 0;
    for (const { job } of existing) job.stop();
    this.jobs.delete(userId);
    console.log(`[scheduler] removed ${existing.length} reminder(s) for user ${userId}`);
    return existing.length;
  }

  listJobs(userId: UserId): ReminderJob[] {
    return (this.jobs.get(userId) ?? []).map(({ job, time, dayFilter, timezone }) => ({
      id: jobIdFor(userId, time),
      userId,
      time,
      dayFilter,
      timezone,
      pattern: cronPatternFor(time, dayFilter),
      nextRun: job.nextRun(),
    }));
  }

  nextRun(userId: UserId): Date | null {
    let earliest: Date | null = null;
    for (const { nextRun } of this.listJobs(userId)) {
      if (nextRun && (!earliest || nextRun < earliest)) earliest = nextRun;
    }
    return earliest;
  }

  /** Rebuilds jobs for every stored schedule. Returns the number of users restored. */
  async restoreAll(storage: Pick<PracticeStorage, "listUsersWithSchedules">): Promise<number> {
    const users = await storage.listUsersWithSchedules();
    let restored = 0;
    for (const { userId, schedule } of users) {
      if (this.scheduleForUser(userId, schedule) > 0) restored += 1;
    }
    console.log(`[scheduler] restored reminders for ${restored} user(s)`);
    return restored;
  }

  /** Runs the user's first reminder job immediately, outside its schedule. */
  async trigger(userId: UserId): Promise<boolean> {
    const first = this.jobs.get(userId)?.[0];
    if (!first) return false;
    await first.job.trigger();
    return true;
  }

  shutdown(): void {
    for (const userId of [...this.jobs.keys()]) this.cancelForUser(userId);
  }

  private fire(userId: UserId, time: string): void {
    console.log(`[scheduler] reminder ${time} for user ${userId}`);
    void Promise.resolve()
      .then(() => this.options.onReminder(userId))
      .catch((err: unknown) => console.error(`[scheduler] reminder delivery failed for ${userId}`, safeString(err)));
  }
}
