// src/handlers/reminders.ts
import type { Directive } from "../contracts/directives.js";
import type { ReminderAction, UserId } from "../contracts/events.js";
import type { ScheduleSpec } from "../contracts/schedule.js";
import type { PracticeStorage } from "../db/storage.js";
import type { DirectiveSink } from "../core/outbox.js";
import { logPreview, safeString } from "../server_safe_string.js";
import type { ScheduleParseFn } from "../services/schedule_parser.js";
import { isValidTimeZone, type ReminderScheduler } from "../services/scheduler.js";
import type { TranscribeFn } from "../services/transcription.js";

export type ReminderSettingsDeps = {
  storage: Pick<PracticeStorage, "getTimezone" | "setTimezone" | "getReminderSchedule" | "setReminderSchedule">;
  scheduler: Pick<ReminderScheduler, "scheduleForUser" | "cancelForUser" | "nextRun">;
  parseSchedule: ScheduleParseFn;
  transcribe: TranscribeFn;
  isAuthenticated: (userId: UserId) => Promise<boolean>;
  sink: DirectiveSink;
  defaultTimezone: string;
  voiceLanguage?: string;
};

/** Timezone and reminder-schedule configuration for one user at a time. */
export class ReminderSettings {
  private readonly transcripts = new Map<UserId, string>();

  constructor(private readonly deps: ReminderSettingsDeps) {}

  async handle(userId: UserId, action: ReminderAction): Promise<Directive[]> {
    let directives: Directive[];
    try {
      directives = (await this.deps.isAuthenticated(userId))
        ? await this.run(userId, action)
        : [{ type: "AUTH_REQUIRED" }];
    } catch (err) {
      console.error(`[reminders] user_id=${userId} action=${action.type} failed`, safeString(err));
      directives = [{ type: "SHOW_ERROR", reason: "retry" }];
    }
    this.deps.sink.deliver(userId, directives);
    return directives;
  }

  /** Forget any unconfirmed voice transcript for the user. */
  forget(userId: UserId): void {
    this.transcripts.delete(userId);
  }

  private async run(userId: UserId, action: ReminderAction): Promise<Directive[]> {
    switch (action.type) {
      case "BEGIN_SETUP": {
        const timezone = await this.deps.storage.getTimezone(userId);
        if (timezone === this.deps.defaultTimezone) return [{ type: "ASK_TIMEZONE" }];
        return [{ type: "ASK_SCHEDULE", timezone }];
      }
      case "ASK_CUSTOM_TIMEZONE":
        return [{ type: "ASK_CUSTOM_TIMEZONE" }];
      case "SET_TIMEZONE": {
        const timezone = action.timezone.trim();
        if (!isValidTimeZone(timezone)) return [{ type: "TIMEZONE_INVALID", timezone }];
        await this.deps.storage.setTimezone(userId, timezone);
        console.log(`[reminders] user_id=${userId} timezone=${timezone}`);
        return [{ type: "ASK_SCHEDULE", timezone }];
      }
      case "SUBMIT_SCHEDULE":
        return this.configure(userId, action.text);
      case "SUBMIT_SCHEDULE_VOICE": {
        const text = await this.deps.transcribe(action.audio, this.deps.voiceLanguage ?? "ru");
        if (!text) return [{ type: "SHOW_NOTICE", notice: "transcription_failed" }];
        this.transcripts.set(userId, text);
        return [{ type: "SCHEDULE_TRANSCRIBED", text }];
      }
      case "CONFIRM_TRANSCRIPT": {
        const text = this.transcripts.get(userId);
        if (!text) return [{ type: "SHOW_NOTICE", notice: "unknown_command" }];
        this.transcripts.delete(userId);
        return this.configure(userId, text);
      }
      case "CANCEL_TRANSCRIPT": {
        this.transcripts.delete(userId);
        return [{ type: "ASK_SCHEDULE", timezone: await this.deps.storage.getTimezone(userId) }];
      }
      case "VIEW": {
        const schedule = await this.deps.storage.getReminderSchedule(userId);
        if (!schedule) return [{ type: "SCHEDULE_NONE" }];
        const nextRun = this.deps.scheduler.nextRun(userId);
        return [{ type: "SCHEDULE_VIEW", schedule, nextRun: nextRun ? nextRun.toISOString() : null }];
      }
      case "DISABLE": {
        this.transcripts.delete(userId);
        this.deps.scheduler.cancelForUser(userId);
        await this.deps.storage.setReminderSchedule(userId, null);
        console.log(`[reminders] user_id=${userId} disabled reminders`);
        return [{ type: "SCHEDULE_DISABLED" }];
      }
    }
  }

  private async configure(userId: UserId, text: string): Promise<Directive[]> {
    const userTimezone = await this.deps.storage.getTimezone(userId);
    const parsed = await this.deps.parseSchedule(text, userTimezone);
    if (!parsed) {
      console.warn(`[reminders] user_id=${userId} unparsed schedule "${logPreview(text)}"`);
      return [{ type: "SCHEDULE_PARSE_FAILED" }];
    }
    // the stored zone is the user's unless the request named another valid one
    const schedule: ScheduleSpec = {
      ...parsed,
      timezone: isValidTimeZone(parsed.timezone) ? parsed.timezone : userTimezone,
    };
    await this.deps.storage.setReminderSchedule(userId, schedule);
    this.deps.scheduler.scheduleForUser(userId, schedule);
    return [{ type: "SCHEDULE_CONFIGURED", schedule }];
  }
}
