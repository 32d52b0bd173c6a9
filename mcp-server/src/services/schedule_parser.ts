// src/services/schedule_parser.ts
import { DAY_FILTERS, ScheduleSpecZod, type DayFilter, type ScheduleSpec } from "../contracts/schedule.js";
import { callStrictJson, type StrictJsonSchema } from "../core/llm.js";
import { logPreview, safeString } from "../server_safe_string.js";

export type ScheduleParseFn = (text: string, timezone: string) => Promise<ScheduleSpec | null>;

const SCHEDULE_INSTRUCTIONS = `Speak Russian. Parse natural language reminder request into specific times.

You will receive current date/time context at the beginning of the user's message. Use this context to interpret:
- Relative time references like "завтра" (tomorrow), "сегодня" (today), "через час" (in an hour)
- Weekday references like "в будни" (weekdays), "в понедельник" (on Monday)
- Time-relative phrases like "после обеда" (after lunch), based on current time

If request is vague, make reasonable assumptions:
- Morning (утро): 08:00-12:00
- Lunch (обед): 12:00-14:00
- Afternoon (день): 14:00-18:00
- Evening (вечер): 18:00-22:00
- "Often" or "frequently" (часто): every 2-3 hours

Output a JSON object:
- "times": list of "HH:MM" strings (24-hour clock)
- "day_filter": "all" (every day), "weekdays" (Monday to Friday) or "weekends" (Saturday and Sunday)
- "timezone": the timezone given in the context

Use the timezone provided in the context for the "timezone" field.`;

const SCHEDULE_JSON_SCHEMA: StrictJsonSchema = {
  type: "object",
  additionalProperties: false,
  required: ["times", "day_filter", "timezone"],
  properties: {
    times: { type: "array", items: { type: "string" } },
    day_filter: { type: "string", enum: [...DAY_FILTERS] },
    timezone: { type: "string" },
  },
};

const WEEKDAYS_EN = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const WEEKDAYS_RU = ["Воскресенье", "Понедельник", "Вторник", "Среда", "Четверг", "Пятница", "Суббота"];

/** "Context: Today is Monday (Понедельник), 2026-10-19, current time is 09:05 (timezone: Europe/Moscow)." */
export function describeNow(now: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    weekday: "long",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";

  const weekday = get("weekday");
  const ru = WEEKDAYS_RU[WEEKDAYS_EN.indexOf(weekday)] ?? weekday;
  return `Context: Today is ${weekday} (${ru}), ${get("year")}-${get("month")}-${get("day")}, current time is ${get("hour")}:${get("minute")} (timezone: ${timezone}).`;
}

export type ParseScheduleOptions = {
  model?: string;
  timeoutMs?: number;
  now?: () => Date;
};

/**
 * Natural-language schedule → validated ScheduleSpec. Every failure (network,
 * timeout, malformed output) is logged and reported as null.
 */
export async function parseSchedule(
  text: string,
  timezone: string,
  options: ParseScheduleOptions = {}
): Promise<ScheduleSpec | null> {
  const request = text.trim();
  if (!request) return null;
  const now = (options.now ?? (() => new Date()))();

  try {
    const { data, attempts } = await callStrictJson({
      model: options.model ?? "gpt-4o-mini",
      instructions: SCHEDULE_INSTRUCTIONS,
      userInput: `${describeNow(now, timezone)}\n\nUser request: ${request}`,
      schemaName: "ReminderSchedule",
      jsonSchema: SCHEDULE_JSON_SCHEMA,
      zodSchema: ScheduleSpecZod,
      temperature: 0.2,
      maxOutputTokens: 256,
      timeoutMs: options.timeoutMs,
      debugLabel: "schedule_parser",
    });
    const schedule = normalizeSchedule(data);
    console.log(`[schedule] parsed "${logPreview(request)}" in ${attempts} attempt(s): ${formatScheduleSummary(schedule)}`);
    return schedule;
  } catch (err) {
    console.error(`[schedule] failed to parse "${logPreview(request)}"`, safeString(err));
    return null;
  }
}

export function createScheduleParser(options: ParseScheduleOptions = {}): ScheduleParseFn {
  return (text, timezone) => parseSchedule(text, timezone, options);
}

/** Sorted, de-duplicated times; one job per distinct time. */
export function normalizeSchedule(schedule: ScheduleSpec): ScheduleSpec {
  return {
    times: [...new Set(schedule.times)].sort(),
    day_filter: schedule.day_filter,
    timezone: schedule.timezone.trim(),
  };
}

const DAY_FILTER_SUFFIX: Record<DayFilter, string> = {
  all: "",
  weekdays: " (только в будни)",
  weekends: " (только в выходные)",
};

export function formatScheduleSummary(schedule: ScheduleSpec): string {
  return `Напоминания в ${schedule.times.join(", ")}${DAY_FILTER_SUFFIX[schedule.day_filter]} (${schedule.timezone})`;
}
