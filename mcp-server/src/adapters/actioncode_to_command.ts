import { ACTION, FIELD_CHOICE_PREFIX, TIMEZONE_PREFIX } from "../contracts/action_codes.js";
import type { AccountAction, PracticeEvent, ReminderAction, SurfaceCommand } from "../contracts/events.js";
import { FORM_CHOICES } from "../core/fields.js";

const practice = (event: PracticeEvent): SurfaceCommand => ({ surface: "practice", event });
const reminders = (action: ReminderAction): SurfaceCommand => ({ surface: "reminders", action });
const account = (action: AccountAction): SurfaceCommand => ({ surface: "account", action });

/** Button payload → the command it stands for. Unknown payloads give null. */
export function actionCodeToCommand(actionCode: string): SurfaceCommand | null {
  const code = String(actionCode || "").trim();

  switch (code) {
    case ACTION.FIELD_OK:
      return practice({ type: "CONFIRM" });
    case ACTION.FIELD_BACK:
      return practice({ type: "GO_BACK" });
    case ACTION.FIELD_REPLACE:
      return practice({ type: "REPLACE_ANSWER" });
    case ACTION.PRACTICE_START:
      return practice({ type: "START_PRACTICE" });
    case ACTION.PRACTICE_SAVE:
      return practice({ type: "SAVE" });
    case ACTION.PRACTICE_CANCEL:
      return practice({ type: "CANCEL_PRACTICE" });
    case ACTION.REMINDER_YES_GUIDED:
      return practice({ type: "REMINDER_RESPONSE", accept: true });
    case ACTION.REMINDER_NO:
      return practice({ type: "REMINDER_RESPONSE", accept: false });
    case ACTION.TZ_CUSTOM:
      return reminders({ type: "ASK_CUSTOM_TIMEZONE" });
    case ACTION.SCHEDULE_CONFIRM:
      return reminders({ type: "CONFIRM_TRANSCRIPT" });
    case ACTION.SCHEDULE_CANCEL:
      return reminders({ type: "CANCEL_TRANSCRIPT" });
    case ACTION.EXPORT_JSON:
      return account({ type: "EXPORT", format: "json" });
    case ACTION.EXPORT_TXT:
      return account({ type: "EXPORT", format: "txt" });
    case ACTION.CLEAR_CONFIRM:
      return account({ type: "CLEAR_CONFIRM" });
    case ACTION.CLEAR_CANCEL:
      return account({ type: "CLEAR_CANCEL" });
  }

  if (code.startsWith(FIELD_CHOICE_PREFIX)) {
    const position = Number(code.slice(FIELD_CHOICE_PREFIX.length));
    const value = Number.isInteger(position) && position >= 1 ? FORM_CHOICES[position - 1] : undefined;
    return value ? practice({ type: "SELECT_CHOICE", value }) : null;
  }

  if (code.startsWith(TIMEZONE_PREFIX)) {
    const timezone = code.slice(TIMEZONE_PREFIX.length);
    return timezone ? reminders({ type: "SET_TIMEZONE", timezone }) : null;
  }

  return null;
}
