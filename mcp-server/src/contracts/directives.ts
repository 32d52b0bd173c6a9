import { z } from "zod";
import { FieldNameZod } from "../core/fields.js";
import { ExportFormatZod } from "./events.js";
import { ScheduleSpecZod } from "./schedule.js";

const FieldIndexZod = z.number().int().min(0);

export const ShowPromptZod = z.object({
  type: z.literal("SHOW_PROMPT"),
  fieldIndex: FieldIndexZod,
  field: FieldNameZod,
  canGoBack: z.boolean(),
});

export const ShowChoiceZod = z.object({
  type: z.literal("SHOW_CHOICE"),
  fieldIndex: FieldIndexZod,
  field: FieldNameZod,
  choices: z.array(z.string()).min(1),
  canGoBack: z.boolean(),
});

export const ShowConfirmationZod = z.object({
  type: z.literal("SHOW_CONFIRMATION"),
  fieldIndex: FieldIndexZod,
  field: FieldNameZod,
  text: z.string(),
  canGoBack: z.boolean(),
  // true when the answer was collected on an earlier pass and is offered for keep-or-replace
  revisiting: z.boolean(),
});

export const ValidationReasonZod = z.enum([
  "empty_answer",
  "unknown_choice",
  "not_a_choice_field",
  "not_ready",
  "missing_field",
]);
export type ValidationReason = z.infer<typeof ValidationReasonZod>;

export const NoticeZod = z.enum([
  "at_first_field",
  "transcription_failed",
  "practice_cancelled",
  "unknown_command",
]);
export type Notice = z.infer<typeof NoticeZod>;

export const DirectiveZod = z.discriminatedUnion("type", [
  ShowPromptZod,
  ShowChoiceZod,
  ShowConfirmationZod,
  z.object({ type: z.literal("SHOW_READY_TO_SAVE") }),
  z.object({ type: z.literal("SHOW_VALIDATION_ERROR"), reason: ValidationReasonZod }),
  z.object({ type: z.literal("SHOW_SAVED"), entryId: z.number().int().positive() }),
  z.object({ type: z.literal("SHOW_ERROR"), reason: z.enum(["retry", "apology"]) }),
  z.object({ type: z.literal("SHOW_NOTICE"), notice: NoticeZod }),

  z.object({ type: z.literal("AUTH_REQUIRED") }),
  z.object({ type: z.literal("AUTH_SUCCESS") }),
  z.object({ type: z.literal("AUTH_FAILED") }),
  z.object({ type: z.literal("READY") }),

  z.object({ type: z.literal("REMINDER_PROMPT") }),
  z.object({ type: z.literal("ASK_TIMEZONE") }),
  z.object({ type: z.literal("ASK_CUSTOM_TIMEZONE") }),
  z.object({ type: z.literal("TIMEZONE_INVALID"), timezone: z.string() }),
  z.object({ type: z.literal("ASK_SCHEDULE"), timezone: z.string() }),
  z.object({ type: z.literal("SCHEDULE_TRANSCRIBED"), text: z.string() }),
  z.object({ type: z.literal("SCHEDULE_PARSE_FAILED") }),
  z.object({ type: z.literal("SCHEDULE_CONFIGURED"), schedule: ScheduleSpecZod }),
  z.object({
    type: z.literal("SCHEDULE_VIEW"),
    schedule: ScheduleSpecZod,
    nextRun: z.string().nullable(),
  }),
  z.object({ type: z.literal("SCHEDULE_NONE") }),
  z.object({ type: z.literal("SCHEDULE_DISABLED") }),

  z.object({ type: z.literal("EXPORT_MENU") }),
  z.object({
    type: z.literal("EXPORT_READY"),
    format: ExportFormatZod,
    fileName: z.string(),
    count: z.number().int().min(0),
    document: z.string(),
  }),
  z.object({ type: z.literal("EXPORT_EMPTY") }),
  z.object({ type: z.literal("CLEAR_CONFIRM_REQUEST") }),
  z.object({ type: z.literal("CLEAR_CANCELLED") }),
  z.object({ type: z.literal("DATA_CLEARED") }),
]);

export type Directive = z.infer<typeof DirectiveZod>;
export type DirectiveType = Directive["type"];
