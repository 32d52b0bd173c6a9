// src/adapters/tool_input.ts
import { z } from "zod";
import {
  CancelPracticeEventZod,
  ConfirmEventZod,
  GoBackEventZod,
  ReminderResponseEventZod,
  ReplaceAnswerEventZod,
  SaveEventZod,
  SelectChoiceEventZod,
  StartPracticeEventZod,
  SubmitTextEventZod,
  type PracticeEvent,
  type ReminderAction,
} from "../contracts/events.js";

// Tool calls carry JSON only, so voice arrives as base64 and is decoded here.
const Base64AudioZod = z
  .string()
  .trim()
  .min(1)
  .base64()
  .transform((value): Uint8Array => Buffer.from(value, "base64"));

export const PracticeEventWireZod = z.discriminatedUnion("type", [
  StartPracticeEventZod,
  SubmitTextEventZod,
  z.object({ type: z.literal("SUBMIT_VOICE"), audio_base64: Base64AudioZod }),
  SelectChoiceEventZod,
  ConfirmEventZod,
  ReplaceAnswerEventZod,
  GoBackEventZod,
  SaveEventZod,
  CancelPracticeEventZod,
  ReminderResponseEventZod,
]);

export type PracticeEventWire = z.output<typeof PracticeEventWireZod>;

export const ReminderActionWireZod = z.discriminatedUnion("type", [
  z.object({ type: z.literal("BEGIN_SETUP") }),
  z.object({ type: z.literal("ASK_CUSTOM_TIMEZONE") }),
  z.object({ type: z.literal("SET_TIMEZONE"), timezone: z.string() }),
  z.object({ type: z.literal("SUBMIT_SCHEDULE"), text: z.string() }),
  z.object({ type: z.literal("SUBMIT_SCHEDULE_VOICE"), audio_base64: Base64AudioZod }),
  z.object({ type: z.literal("CONFIRM_TRANSCRIPT") }),
  z.object({ type: z.literal("CANCEL_TRANSCRIPT") }),
  z.object({ type: z.literal("VIEW") }),
  z.object({ type: z.literal("DISABLE") }),
]);

export type ReminderActionWire = z.output<typeof ReminderActionWireZod>;

export function toPracticeEvent(wire: PracticeEventWire): PracticeEvent {
  if (wire.type === "SUBMIT_VOICE") return { type: "SUBMIT_VOICE", audio: wire.audio_base64 };
  return wire;
}

export function toReminderAction(wire: ReminderActionWire): ReminderAction {
  if (wire.type === "SUBMIT_SCHEDULE_VOICE") return { type: "SUBMIT_SCHEDULE_VOICE", audio: wire.audio_base64 };
  return wire;
}
