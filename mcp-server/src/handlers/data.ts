// src/handlers/data.ts
import { formatLocalDateTime } from "../adapters/directive_view.js";
import type { Directive } from "../contracts/directives.js";
import type { AccountAction, ExportFormat, UserId } from "../contracts/events.js";
import type { PracticeEntry } from "../db/schema.js";
import type { PracticeStorage } from "../db/storage.js";
import { PRACTICE_FIELDS } from "../core/fields.js";
import type { DirectiveSink } from "../core/outbox.js";
import { safeString } from "../server_safe_string.js";

export type DataAction = Exclude<AccountAction, { type: "START" } | { type: "AUTHENTICATE" }>;

export type UserDataServiceDeps = {
  storage: Pick<PracticeStorage, "listEntries" | "getTimezone" | "clearUserData">;
  isAuthenticated: (userId: UserId) => Promise<boolean>;
  /** Everything outside storage that holds per-user state: reminders, session, buffers. */
  forgetUser: (userId: UserId) => Promise<void>;
  sink: DirectiveSink;
  now?: () => Date;
};

export function renderEntriesJson(userId: UserId, entries: readonly PracticeEntry[], exportedAt: Date): string {
  return JSON.stringify(
    {
      user_id: userId,
      exported_at: exportedAt.toISOString(),
      count: entries.length,
      entries: entries.map(({ id, date, content, attitude, form, body, response }) => ({
        id,
        date,
        content,
        attitude,
        form,
        body,
        response,
      })),
    },
    null,
    2
  );
}

export function renderEntriesText(entries: readonly PracticeEntry[], timezone: string): string {
  return entries
    .map((entry) => {
      const lines = [`Запись #${entry.id} (${formatLocalDateTime(entry.date, timezone)})`];
      for (const field of PRACTICE_FIELDS) lines.push(`${field.label}: ${entry[field.name]}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

/** Export and erasure of a user's stored practice data. */
export class UserDataService {
  constructor(private readonly deps: UserDataServiceDeps) {}

  async handle(userId: UserId, action: DataAction): Promise<Directive[]> {
    let directives: Directive[];
    try {
      directives = (await this.deps.isAuthenticated(userId))
        ? await this.run(userId, action)
        : [{ type: "AUTH_REQUIRED" }];
    } catch (err) {
      console.error(`[data] user_id=${userId} action=${action.type} failed`, safeString(err));
      directives = [{ type: "SHOW_ERROR", reason: "retry" }];
    }
    this.deps.sink.deliver(userId, directives);
    return directives;
  }

  private async run(userId: UserId, action: DataAction): Promise<Directive[]> {
    switch (action.type) {
      case "EXPORT_MENU":
        return [{ type: "EXPORT_MENU" }];
      case "EXPORT":
        return [await this.exportEntries(userId, action.format)];
      case "CLEAR_REQUEST":
        return [{ type: "CLEAR_CONFIRM_REQUEST" }];
      case "CLEAR_CANCEL":
        return [{ type: "CLEAR_CANCELLED" }];
      case "CLEAR_CONFIRM": {
        await this.deps.forgetUser(userId);
        const removed = await this.deps.storage.clearUserData(userId);
        console.log(`[data] user_id=${userId} cleared entries=${removed.entries} refusals=${removed.refusals}`);
        return [{ type: "DATA_CLEARED" }];
      }
    }
  }

  private async exportEntries(userId: UserId, format: ExportFormat): Promise<Directive> {
    const entries = await this.deps.storage.listEntries(userId);
    if (!entries.length) return { type: "EXPORT_EMPTY" };

    const now = (this.deps.now ?? (() => new Date()))();
    const stamp = now.toISOString().slice(0, 10).replace(/-/g, "");
    const document =
      format === "json"
        ? renderEntriesJson(userId, entries, now)
        : renderEntriesText(entries, await this.deps.storage.getTimezone(userId));
    console.log(`[data] user_id=${userId} exported ${entries.length} entries as ${format}`);
    return {
      type: "EXPORT_READY",
      format,
      fileName: `practice_entries_${stamp}.${format}`,
      count: entries.length,
      document,
    };
  }
}
