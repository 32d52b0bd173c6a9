import { z } from "zod";

export const UserIdZod = z.string().trim().min(1).max(128);
export type UserId = string;

const AudioBytesZod = z.custom<Uint8Array>((value) => value instanceof Uint8Array, {
  message: "audio must be raw bytes",
});

export const StartPracticeEventZod = z.object({ type: z.literal("START_PRACTICE") });

export const SubmitTextEventZod = z.object({
  type: z.literal("SUBMIT_TEXT"),
  text: z.string(),
});

export const SubmitVoiceEventZod = z.object({
  type: z.literal("SUBMIT_VOICE"),
  audio: AudioBytesZod,
});

export const SelectChoiceEventZod = z.object({
  type: z.literal("SELECT_CHOICE"),
  value: z.string(),
});

export const ConfirmEventZod = z.object({ type: z.literal("CONFIRM") });
export const ReplaceAnswerEventZod = z.object({ type: z.literal("REPLACE_ANSWER") });
export const GoBackEventZod = z.object({ type: z.literal("GO_BACK") });
export const SaveEventZod = z.object({ type: z.literal("SAVE") });
export const CancelPracticeEventZod = z.object({ type: z.literal("CANCEL_PRACTICE") });

export const ReminderResponseEventZod = z.object({
  type: z.literal("REMINDER_RESPONSE"),
  accept: z.boolean(),
});

export const PracticeEventZod = z.discriminatedUnion("type", [
  StartPracticeEventZod,
  SubmitTextEventZod,
  SubmitVoiceEventZod,
  SelectChoiceEventZod,
  ConfirmEventZod,
  ReplaceAnswerEventZod,
  GoBackEventZod,
  SaveEventZod,
  CancelPracticeEventZod,
  ReminderResponseEventZod,
]);

export type PracticeEvent = z.infer<typeof PracticeEventZod>;
export type PracticeEventType = PracticeEvent["type"];

export const ReminderActionZod = z.discriminatedUnion("type", [
  z.object({ type: z.literal("BEGIN_SETUP") }),
  z.object({ type: z.literal("ASK_CUSTOM_TIMEZONE") }),
  z.object({ type: z.literal("SET_TIMEZONE"), timezone: z.string() }),
  z.object({ type: z.literal("SUBMIT_SCHEDULE"), text: z.string() }),
  z.object({ type: z.literal("SUBMIT_SCHEDULE_VOICE"), audio: AudioBytesZod }),
  z.object({ type: z.literal("CONFIRM_TRANSCRIPT") }),
  z.object({ type: z.literal("CANCEL_TRANSCRIPT") }),
  z.object({ type: z.literal("VIEW") }),
  z.object({ type: z.literal("DISABLE") }),
]);

export type ReminderAction = z.infer<typeof ReminderActionZod>;

export const ExportFormatZod = z.enum(["json", "txt"]);
export type ExportFormat = z.infer<typeof ExportFormatZod>;

export const AccountActionZod = z.discriminatedUnion("type", [
  z.object({ type: z.literal("START") }),
  z.object({ type: z.literal("AUTHENTICATE"), password: z.string() }),
  z.object({ type: z.literal("EXPORT_MENU") }),
  z.object({ type: z.literal("EXPORT"), format: ExportFormatZod }),
  z.object({ type: z.literal("CLEAR_REQUEST") }),
  z.object({ type: z.literal("CLEAR_CONFIRM") }),
  z.object({ type: z.literal("CLEAR_CANCEL") }),
]);

export type AccountAction = z.infer<typeof AccountActionZod>;

/** What a button press resolves to: one action on one surface. */
export type SurfaceCommand =
  | { surface: "practice"; event: PracticeEvent }
  | { surface: "reminders"; action: ReminderAction }
  | { surface: "account"; action: AccountAction };
