import test from "node:test";
import assert from "node:assert/strict";
import { actionCodeToCommand } from "../adapters/actioncode_to_command.js";
import { formatLocalDateTime, renderDirective } from "../adapters/directive_view.js";
import { toPracticeEvent, toReminderAction, PracticeEventWireZod, ReminderActionWireZod } from "../adapters/tool_input.js";
import { PRACTICE_FIELDS } from "../core/fields.js";
import { TIMEZONE_OPTIONS } from "../core/phrases.js";
import { ACTION, choiceActionCode, timezoneActionCode } from "./action_codes.js";
import type { Directive } from "./directives.js";

test("first prompt offers cancel but no back button", () => {
  const view = renderDirective({ type: "SHOW_PROMPT", fieldIndex: 0, field: "content", canGoBack: false });
  assert.equal(view.text, `${PRACTICE_FIELDS[0]?.prompt}\n\nОтправь голосовое сообщение или напиши текст.`);
  assert.deepEqual(view.buttons, [{ label: "Прервать запись", action_code: ACTION.PRACTICE_CANCEL }]);
});

test("choice prompt lists the four forms in order, then back and cancel", () => {
  const view = renderDirective({
    type: "SHOW_CHOICE",
    fieldIndex: 2,
    field: "form",
    choices: ["Да-принимающее", "Нет-принимающее", "Да-отрицающее", "Нет-отрицающее"],
    canGoBack: true,
  });
  assert.deepEqual(
    view.buttons.map((b) => b.action_code),
    ["FIELD_CHOICE_1", "FIELD_CHOICE_2", "FIELD_CHOICE_3", "FIELD_CHOICE_4", "FIELD_BACK", "PRACTICE_CANCEL"]
  );
  assert.equal(view.buttons[0]?.label, "Да-принимающее");
});

test("confirmation of a fresh answer offers ok and back", () => {
  const view = renderDirective({
    type: "SHOW_CONFIRMATION",
    fieldIndex: 1,
    field: "attitude",
    text: "напряжение в плечах",
    canGoBack: true,
    revisiting: false,
  });
  assert.equal(view.text, "напряжение в плечах\n\nПодтвердите ответ или добавьте что-то если необходимо.");
  assert.deepEqual(
    view.buttons.map((b) => b.label),
    ["Всё ок", "Назад"]
  );
});

test("confirmation of a revisited answer adds the rewrite button", () => {
  const view = renderDirective({
    type: "SHOW_CONFIRMATION",
    fieldIndex: 0,
    field: "content",
    text: "старый ответ",
    canGoBack: false,
    revisiting: true,
  });
  assert.deepEqual(
    view.buttons.map((b) => b.action_code),
    [ACTION.FIELD_OK, ACTION.FIELD_REPLACE]
  );
});

test("configured schedule lists times and days", () => {
  const view = renderDirective({
    type: "SCHEDULE_CONFIGURED",
    schedule: { times: ["09:00", "21:00"], day_filter: "weekdays", timezone: "Europe/Moscow" },
  });
  assert.equal(view.text, "Напоминания настроены.\nВремя: 09:00, 21:00\nДни: по будням");
});

test("schedule view shows the next run on the schedule's wall clock", () => {
  const view = renderDirective({
    type: "SCHEDULE_VIEW",
    schedule: { times: ["09:00"], day_filter: "all", timezone: "Europe/Moscow" },
    nextRun: "2026-10-19T06:00:00.000Z",
  });
  assert.equal(
    view.text,
    "Текущее расписание:\nВремя: 09:00\nДни: каждый день\n\nСледующее напоминание: 2026-10-19 09:00"
  );
});

test("timezone question has one button per zone plus a custom option", () => {
  const view = renderDirective({ type: "ASK_TIMEZONE" });
  assert.equal(view.buttons.length, TIMEZONE_OPTIONS.length + 1);
  assert.deepEqual(view.buttons.at(-1), { label: "Другой часовой пояс", action_code: "TZ_CUSTOM" });
});

test("export attachments carry the document and mime type", () => {
  const view = renderDirective({
    type: "EXPORT_READY",
    format: "txt",
    fileName: "practice_entries_20261018.txt",
    count: 1,
    document: "Запись #1",
  });
  assert.deepEqual(view.attachment, {
    fileName: "practice_entries_20261018.txt",
    mimeType: "text/plain; charset=utf-8",
    content: "Запись #1",
  });
});

test("every button rendered for a directive maps back to a command", () => {
  const directives: Directive[] = [
    { type: "SHOW_PROMPT", fieldIndex: 1, field: "attitude", canGoBack: true },
    {
      type: "SHOW_CHOICE",
      fieldIndex: 2,
      field: "form",
      choices: ["Да-принимающее", "Нет-принимающее", "Да-отрицающее", "Нет-отрицающее"],
      canGoBack: true,
    },
    { type: "SHOW_CONFIRMATION", fieldIndex: 3, field: "body", text: "x", canGoBack: true, revisiting: true },
    { type: "SHOW_READY_TO_SAVE" },
    { type: "REMINDER_PROMPT" },
    { type: "ASK_TIMEZONE" },
    { type: "SCHEDULE_TRANSCRIBED", text: "каждый день в 9" },
    { type: "EXPORT_MENU" },
    { type: "CLEAR_CONFIRM_REQUEST" },
  ];
  for (const directive of directives) {
    for (const { action_code } of renderDirective(directive).buttons) {
      assert.notEqual(actionCodeToCommand(action_code), null, `${directive.type} button ${action_code} is unmapped`);
    }
  }
});

test("action codes resolve to the surface that handles them", () => {
  assert.deepEqual(actionCodeToCommand(ACTION.FIELD_OK), { surface: "practice", event: { type: "CONFIRM" } });
  assert.deepEqual(actionCodeToCommand(choiceActionCode(3)), {
    surface: "practice",
    event: { type: "SELECT_CHOICE", value: "Да-отрицающее" },
  });
  assert.deepEqual(actionCodeToCommand(ACTION.REMINDER_NO), {
    surface: "practice",
    event: { type: "REMINDER_RESPONSE", accept: false },
  });
  assert.deepEqual(actionCodeToCommand(timezoneActionCode("Asia/Tokyo")), {
    surface: "reminders",
    action: { type: "SET_TIMEZONE", timezone: "Asia/Tokyo" },
  });
  assert.deepEqual(actionCodeToCommand(ACTION.TZ_CUSTOM), {
    surface: "reminders",
    action: { type: "ASK_CUSTOM_TIMEZONE" },
  });
  assert.deepEqual(actionCodeToCommand(ACTION.EXPORT_TXT), {
    surface: "account",
    action: { type: "EXPORT", format: "txt" },
  });
});

test("unknown or malformed action codes give null", () => {
  assert.equal(actionCodeToCommand(""), null);
  assert.equal(actionCodeToCommand("NOPE"), null);
  assert.equal(actionCodeToCommand("FIELD_CHOICE_0"), null);
  assert.equal(actionCodeToCommand("FIELD_CHOICE_5"), null);
  assert.equal(actionCodeToCommand("FIELD_CHOICE_x"), null);
  assert.equal(actionCodeToCommand("TZ_"), null);
});

test("local date formatting follows the zone", () => {
  assert.equal(formatLocalDateTime("2026-10-18T21:30:00.000Z", "Europe/Moscow"), "2026-10-19 00:30");
  assert.equal(formatLocalDateTime("2026-10-18T21:30:00.000Z", "Asia/Kolkata"), "2026-10-19 03:00");
});

test("tool input decodes base64 voice into bytes", () => {
  const event = toPracticeEvent(PracticeEventWireZod.parse({ type: "SUBMIT_VOICE", audio_base64: "AQID" }));
  assert.equal(event.type, "SUBMIT_VOICE");
  assert.deepEqual(event.type === "SUBMIT_VOICE" ? [...event.audio] : [], [1, 2, 3]);

  const action = toReminderAction(ReminderActionWireZod.parse({ type: "SUBMIT_SCHEDULE_VOICE", audio_base64: "BAU=" }));
  assert.deepEqual(action.type === "SUBMIT_SCHEDULE_VOICE" ? [...action.audio] : [], [4, 5]);

  assert.deepEqual(toPracticeEvent(PracticeEventWireZod.parse({ type: "SUBMIT_TEXT", text: "hi" })), {
    type: "SUBMIT_TEXT",
    text: "hi",
  });
  assert.equal(PracticeEventWireZod.safeParse({ type: "SUBMIT_VOICE", audio_base64: "not base64!" }).success, false);
});
