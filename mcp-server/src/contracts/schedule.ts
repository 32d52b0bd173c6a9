import { z } from "zod";

export const TIME_OF_DAY_PATTERN = /^([0-1][0-9]|2[0-3]):[0-5][0-9]$/;

export const DAY_FILTERS = ["all", "weekdays", "weekends"] as const;
export const DayFilterZod = z.enum(DAY_FILTERS);
export type DayFilter = z.infer<typeof DayFilterZod>;

export const ScheduleSpecZod = z.object({
  times: z.array(z.string().regex(TIME_OF_DAY_PATTERN)).min(1),
  day_filter: DayFilterZod,
  timezone: z.string().trim().min(1),
});

export type ScheduleSpec = z.infer<typeof ScheduleSpecZod>;
