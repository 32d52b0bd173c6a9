import { count, desc, eq, isNotNull } from "drizzle-orm";
import { z } from "zod";
import { ScheduleSpecZod, type ScheduleSpec } from "../contracts/schedule.js";
import type { UserId } from "../contracts/events.js";
import { StorageError } from "../core/errors.js";
import { safeString } from "../server_safe_string.js";
import type { PracticeDatabase } from "./client.js";
import {
  DEFAULT_TIMEZONE,
  entries,
  refusals,
  users,
  type PracticeEntry,
  type Refusal,
  type User,
} from "./schema.js";

const RequiredTextZod = z.string().trim().min(1);

export const NewEntryZod = z.object({
  userId: RequiredTextZod,
  date: z.string().datetime({ offset: true }),
  content: RequiredTextZod,
  attitude: RequiredTextZod,
  form: RequiredTextZod,
  body: RequiredTextZod,
  response: RequiredTextZod,
});

export type NewEntry = z.infer<typeof NewEntryZod>;

export type ScheduledUser = { userId: UserId; schedule: ScheduleSpec; timezone: string };

export interface PracticeStorage {
  // Users
  ensureUser(userId: UserId): Promise<User>;
  getUser(userId: UserId): Promise<User | undefined>;
  setAuthenticated(userId: UserId, authenticated: boolean): Promise<void>;
  isAuthenticated(userId: UserId): Promise<boolean>;
  touchActivity(userId: UserId): Promise<void>;

  // Reminder settings
  getTimezone(userId: UserId): Promise<string>;
  setTimezone(userId: UserId, timezone: string): Promise<void>;
  getReminderSchedule(userId: UserId): Promise<ScheduleSpec | null>;
  setReminderSchedule(userId: UserId, schedule: ScheduleSpec | null): Promise<void>;
  listUsersWithSchedules(): Promise<ScheduledUser[]>;

  // Entries
  createEntry(entry: NewEntry): Promise<number>;
  listEntries(userId: UserId, options?: { limit?: number; offset?: number }): Promise<PracticeEntry[]>;
  countEntries(userId: UserId): Promise<number>;

  // Refusals
  createRefusal(userId: UserId): Promise<number>;
  listRefusals(userId: UserId): Promise<Refusal[]>;

  clearUserData(userId: UserId): Promise<{ entries: number; refusals: number }>;
}

export class DatabaseStorage implements PracticeStorage {
  constructor(
    private readonly db: PracticeDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  async ensureUser(userId: UserId): Promise<User> {
    this.db.insert(users).values({ userId }).onConflictDoNothing().run();
    const user = this.db.select().from(users).where(eq(users.userId, userId)).get();
    if (!user) throw new StorageError(`User ${userId} missing after insert`);
    return user;
  }

  async getUser(userId: UserId): Promise<User | undefined> {
    return this.db.select().from(users).where(eq(users.userId, userId)).get();
  }

  async setAuthenticated(userId: UserId, authenticated: boolean): Promise<void> {
    const user = await this.ensureUser(userId);
    const timestamp = this.now().toISOString();
    this.db
      .update(users)
      .set({
        isAuthenticated: authenticated,
        firstAuthDate: authenticated && !user.firstAuthDate ? timestamp : user.firstAuthDate,
        lastActive: timestamp,
      })
      .where(eq(users.userId, userId))
      .run();
  }

  async isAuthenticated(userId: UserId): Promise<boolean> {
    const row = this.db
      .select({ isAuthenticated: users.isAuthenticated })
      .from(users)
      .where(eq(users.userId, userId))
      .get();
    return row?.isAuthenticated ?? false;
  }

  async touchActivity(userId: UserId): Promise<void> {
    this.db
      .update(users)
      .set({ lastActive: this.now().toISOString() })
      .where(eq(users.userId, userId))
      .run();
  }

  async getTimezone(userId: UserId): Promise<string> {
    const row = this.db.select({ timezone: users.timezone }).from(users).where(eq(users.userId, userId)).get();
    return row?.timezone ?? DEFAULT_TIMEZONE;
  }

  async setTimezone(userId: UserId, timezone: string): Promise<void> {
    await this.ensureUser(userId);
    this.db.update(users).set({ timezone }).where(eq(users.userId, userId)).run();
  }

  async getReminderSchedule(userId: UserId): Promise<ScheduleSpec | null> {
    const row = this.db
      .select({ schedule: users.reminderSchedule })
      .from(users)
      .where(eq(users.userId, userId))
      .get();
    return readSchedule(userId, row?.schedule);
  }

  async setReminderSchedule(userId: UserId, schedule: ScheduleSpec | null): Promise<void> {
    const value = schedule === null ? null : ScheduleSpecZod.parse(schedule);
    await this.ensureUser(userId);
    this.db.update(users).set({ reminderSchedule: value }).where(eq(users.userId, userId)).run();
  }

  async listUsersWithSchedules(): Promise<ScheduledUser[]> {
    const rows = this.db
      .select({ userId: users.userId, schedule: users.reminderSchedule, timezone: users.timezone })
      .from(users)
      .where(isNotNull(users.reminderSchedule))
      .all();
    const out: ScheduledUser[] = [];
    for (const row of rows) {
      const schedule = readSchedule(row.userId, row.schedule);
      if (schedule) out.push({ userId: row.userId, schedule, timezone: row.timezone });
    }
    return out;
  }

  async createEntry(entry: NewEntry): Promise<number> {
    const parsed = NewEntryZod.safeParse(entry);
    if (!parsed.success) {
      throw new StorageError(`Invalid practice entry: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`);
    }
    await this.ensureUser(parsed.data.userId);
    const row = this.db.insert(entries).values(parsed.data).returning({ id: entries.id }).get();
    console.log(`[db] created entry ${row.id} for user ${parsed.data.userId}`);
    return row.id;
  }

  async listEntries(userId: UserId, options: { limit?: number; offset?: number } = {}): Promise<PracticeEntry[]> {
    const query = this.db
      .select()
      .from(entries)
      .where(eq(entries.userId, userId))
      .orderBy(desc(entries.date), desc(entries.id));
    if (options.limit === undefined) return query.all();
    return query.limit(options.limit).offset(options.offset ?? 0).all();
  }

  async countEntries(userId: UserId): Promise<number> {
    const row = this.db.select({ value: count() }).from(entries).where(eq(entries.userId, userId)).get();
    return row?.value ?? 0;
  }

  async createRefusal(userId: UserId): Promise<number> {
    await this.ensureUser(userId);
    const row = this.db
      .insert(refusals)
      .values({ userId, date: this.now().toISOString() })
      .returning({ id: refusals.id })
      .get();
    return row.id;
  }

  async listRefusals(userId: UserId): Promise<Refusal[]> {
    return this.db.select().from(refusals).where(eq(refusals.userId, userId)).orderBy(desc(refusals.date)).all();
  }

  async clearUserData(userId: UserId): Promise<{ entries: number; refusals: number }> {
    return this.db.transaction((tx) => {
      const removedEntries = tx.delete(entries).where(eq(entries.userId, userId)).run().changes;
      const removedRefusals = tx.delete(refusals).where(eq(refusals.userId, userId)).run().changes;
      tx.delete(users).where(eq(users.userId, userId)).run();
      console.log(
        `[db] cleared user ${userId}: entries=${removedEntries} refusals=${removedRefusals}`
      );
      return { entries: removedEntries, refusals: removedRefusals };
    });
  }
}

function readSchedule(userId: UserId, raw: unknown): ScheduleSpec | null {
  if (raw === null || raw === undefined) return null;
  const parsed = ScheduleSpecZod.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[db] ignoring malformed reminder schedule for user ${userId}: ${safeString(raw)}`);
    return null;
  }
  return parsed.data;
}
