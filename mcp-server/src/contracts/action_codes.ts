// Button payloads. Stable strings: clients echo them back through press_button.

export const ACTION = {
  FIELD_OK: "FIELD_OK",
  FIELD_BACK: "FIELD_BACK",
  FIELD_REPLACE: "FIELD_REPLACE",
  PRACTICE_START: "PRACTICE_START",
  PRACTICE_SAVE: "PRACTICE_SAVE",
  PRACTICE_CANCEL: "PRACTICE_CANCEL",
  REMINDER_YES_GUIDED: "REMINDER_YES_GUIDED",
  REMINDER_NO: "REMINDER_NO",
  TZ_CUSTOM: "TZ_CUSTOM",
  SCHEDULE_CONFIRM: "SCHEDULE_CONFIRM",
  SCHEDULE_CANCEL: "SCHEDULE_CANCEL",
  EXPORT_JSON: "EXPORT_JSON",
  EXPORT_TXT: "EXPORT_TXT",
  CLEAR_CONFIRM: "CLEAR_CONFIRM",
  CLEAR_CANCEL: "CLEAR_CANCEL",
} as const;

export const FIELD_CHOICE_PREFIX = "FIELD_CHOICE_";
export const TIMEZONE_PREFIX = "TZ_";

/** 1-based, matching the button order the user sees. */
export function choiceActionCode(position: number): string {
  return `${FIELD_CHOICE_PREFIX}${position}`;
}

export function timezoneActionCode(zone: string): string {
  return `${TIMEZONE_PREFIX}${zone}`;
}
