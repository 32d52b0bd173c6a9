import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { ScheduleSpec } from "../contracts/schedule.js";

export const DEFAULT_TIMEZONE = "Europe/Moscow";

export const users = sqliteTable("users", {
  userId: text("user_id").primaryKey(),
  isAuthenticated: integer("is_authenticated", { mode: "boolean" }).notNull().default(false),
  firstAuthDate: text("first_auth_date"),
  lastActive: text("last_active"),
  reminderSchedule: text("reminder_schedule", { mode: "json" }).$type<ScheduleSpec>(),
  timezone: text("timezone").notNull().default(DEFAULT_TIMEZONE),
});

export const entries = sqliteTable("entries", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: text("user_id")
    .notNull()
    .references(() => users.userId),
  date: text("date").notNull(),
  content: text("content").notNull(),
  attitude: text("attitude").notNull(),
  form: text("form").notNull(),
  body: text("body").notNull(),
  response: text("response").notNull(),
});

export const refusals = sqliteTable("refusals", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: text("user_id")
    .notNull()
    .references(() => users.userId),
  date: text("date").notNull(),
});

export type User = typeof users.$inferSelect;
export type PracticeEntry = typeof entries.$inferSelect;
export type InsertEntry = Omit<typeof entries.$inferInsert, "id">;
export type Refusal = typeof refusals.$inferSelect;
