import type { Directive } from "../contracts/directives.js";
import { ACTION, choiceActionCode, timezoneActionCode } from "../contracts/action_codes.js";
import { fieldByName } from "../core/fields.js";
import { DAY_FILTER_LABELS, PHRASES, TIMEZONE_OPTIONS } from "../core/phrases.js";
import type { ScheduleSpec } from "../contracts/schedule.js";

export type ButtonView = { label: string; action_code: string };

export type AttachmentView = { fileName: string; mimeType: string; content: string };

export type MessageView = {
  text: string;
  buttons: ButtonView[];
  attachment?: AttachmentView;
};

const button = (label: string, action_code: string): ButtonView => ({ label, action_code });

function scheduleLines(schedule: ScheduleSpec): string {
  return `${PHRASES.SCHEDULE_TIME}: ${schedule.times.join(", ")}\n${PHRASES.SCHEDULE_DAYS}: ${DAY_FILTER_LABELS[schedule.day_filter]}`;
}

/** ISO instant → "YYYY-MM-DD HH:MM" on the wall clock of `timezone`. */
export function formatLocalDateTime(iso: string, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(new Date(iso));
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}`;
}

export function renderDirective(directive: Directive): MessageView {
  switch (directive.type) {
    case "SHOW_PROMPT": {
      const buttons = directive.canGoBack ? [button(PHRASES.BTN_BACK, ACTION.FIELD_BACK)] : [];
      buttons.push(button(PHRASES.BTN_CANCEL_PRACTICE, ACTION.PRACTICE_CANCEL));
      return { text: `${fieldByName(directive.field).prompt}\n\n${PHRASES.ANSWER_HINT}`, buttons };
    }
    case "SHOW_CHOICE": {
      const buttons = directive.choices.map((choice, i) => button(choice, choiceActionCode(i + 1)));
      if (directive.canGoBack) buttons.push(button(PHRASES.BTN_BACK, ACTION.FIELD_BACK));
      buttons.push(button(PHRASES.BTN_CANCEL_PRACTICE, ACTION.PRACTICE_CANCEL));
      return { text: fieldByName(directive.field).prompt, buttons };
    }
    case "SHOW_CONFIRMATION": {
      const hint = directive.revisiting ? PHRASES.PRACTICE_REVISIT_HINT : PHRASES.PRACTICE_CONFIRM_HINT;
      const buttons = [button(PHRASES.BTN_OK, ACTION.FIELD_OK)];
      if (directive.revisiting) buttons.push(button(PHRASES.BTN_REWRITE, ACTION.FIELD_REPLACE));
      if (directive.canGoBack) buttons.push(button(PHRASES.BTN_BACK, ACTION.FIELD_BACK));
      return { text: `${directive.text}\n\n${hint}`, buttons };
    }
    case "SHOW_READY_TO_SAVE":
      return {
        text: PHRASES.PRACTICE_COMPLETE_PROMPT,
        buttons: [button(PHRASES.BTN_COMPLETE, ACTION.PRACTICE_SAVE), button(PHRASES.BTN_BACK, ACTION.FIELD_BACK)],
      };
    case "SHOW_VALIDATION_ERROR": {
      const text = {
        empty_answer: PHRASES.EMPTY_ANSWER,
        unknown_choice: PHRASES.UNKNOWN_CHOICE,
        not_a_choice_field: PHRASES.UNKNOWN_COMMAND,
        not_ready: PHRASES.NOT_READY,
        missing_field: PHRASES.MISSING_FIELD,
      }[directive.reason];
      return { text, buttons: [] };
    }
    case "SHOW_SAVED":
      return { text: PHRASES.PRACTICE_SAVED, buttons: [] };
    case "SHOW_ERROR":
      return { text: directive.reason === "apology" ? PHRASES.ERROR_APOLOGY : PHRASES.ERROR_RETRY, buttons: [] };
    case "SHOW_NOTICE": {
      const text = {
        at_first_field: PHRASES.AT_FIRST_FIELD,
        transcription_failed: PHRASES.TRANSCRIPTION_FAILED,
        practice_cancelled: PHRASES.PRACTICE_CANCELLED,
        unknown_command: PHRASES.UNKNOWN_COMMAND,
      }[directive.notice];
      return { text, buttons: [] };
    }

    case "AUTH_REQUIRED":
      return { text: PHRASES.AUTH_REQUEST, buttons: [] };
    case "AUTH_SUCCESS":
      return { text: PHRASES.AUTH_SUCCESS, buttons: [] };
    case "AUTH_FAILED":
      return { text: PHRASES.AUTH_FAILED, buttons: [] };
    case "READY":
      return { text: PHRASES.READY, buttons: [] };

    case "REMINDER_PROMPT":
      return {
        text: PHRASES.REMINDER_PROMPT,
        buttons: [
          button(PHRASES.BTN_YES_GUIDED, ACTION.REMINDER_YES_GUIDED),
          button(PHRASES.BTN_NO, ACTION.REMINDER_NO),
        ],
      };
    case "ASK_TIMEZONE":
      return {
        text: PHRASES.TIMEZONE_QUESTION,
        buttons: [
          ...TIMEZONE_OPTIONS.map((option) => button(option.label, timezoneActionCode(option.zone))),
          button(PHRASES.BTN_OTHER_TIMEZONE, ACTION.TZ_CUSTOM),
        ],
      };
    case "ASK_CUSTOM_TIMEZONE":
      return { text: PHRASES.TIMEZONE_CUSTOM, buttons: [] };
    case "TIMEZONE_INVALID":
      return { text: `${PHRASES.TIMEZONE_INVALID}: ${directive.timezone}. ${PHRASES.TIMEZONE_CUSTOM}`, buttons: [] };
    case "ASK_SCHEDULE":
      return { text: PHRASES.REMINDER_REQUEST, buttons: [] };
    case "SCHEDULE_TRANSCRIBED":
      return {
        text: `${PHRASES.SCHEDULE_RECOGNIZED}: ${directive.text}`,
        buttons: [
          button(PHRASES.BTN_CONFIRM, ACTION.SCHEDULE_CONFIRM),
          button(PHRASES.BTN_CANCEL, ACTION.SCHEDULE_CANCEL),
        ],
      };
    case "SCHEDULE_PARSE_FAILED":
      return { text: PHRASES.SCHEDULE_PARSE_FAILED, buttons: [] };
    case "SCHEDULE_CONFIGURED":
      return { text: `${PHRASES.REMINDER_CONFIGURED}\n${scheduleLines(directive.schedule)}`, buttons: [] };
    case "SCHEDULE_VIEW": {
      let text = `${PHRASES.SCHEDULE_CURRENT}\n${scheduleLines(directive.schedule)}`;
      if (directive.nextRun) {
        text += `\n\n${PHRASES.SCHEDULE_NEXT}: ${formatLocalDateTime(directive.nextRun, directive.schedule.timezone)}`;
      }
      return { text, buttons: [] };
    }
    case "SCHEDULE_NONE":
      return { text: PHRASES.SCHEDULE_NONE, buttons: [] };
    case "SCHEDULE_DISABLED":
      return { text: PHRASES.SCHEDULE_DISABLED, buttons: [] };

    case "EXPORT_MENU":
      return {
        text: PHRASES.EXPORT_PROMPT,
        buttons: [button(PHRASES.BTN_EXPORT_JSON, ACTION.EXPORT_JSON), button(PHRASES.BTN_EXPORT_TXT, ACTION.EXPORT_TXT)],
      };
    case "EXPORT_READY":
      return {
        text: PHRASES.EXPORT_READY,
        buttons: [],
        attachment: {
          fileName: directive.fileName,
          mimeType: directive.format === "json" ? "application/json" : "text/plain; charset=utf-8",
          content: directive.document,
        },
      };
    case "EXPORT_EMPTY":
      return { text: PHRASES.EXPORT_EMPTY, buttons: [] };
    case "CLEAR_CONFIRM_REQUEST":
      return {
        text: PHRASES.DATA_CLEAR_CONFIRM,
        buttons: [
          button(PHRASES.BTN_CONFIRM_DELETE, ACTION.CLEAR_CONFIRM),
          button(PHRASES.BTN_CANCEL, ACTION.CLEAR_CANCEL),
        ],
      };
    case "CLEAR_CANCELLED":
      return { text: PHRASES.DATA_CLEAR_CANCELLED, buttons: [] };
    case "DATA_CLEARED":
      return { text: PHRASES.DATA_CLEARED, buttons: [] };
  }
}
