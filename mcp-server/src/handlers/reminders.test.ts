import test from "node:test";
import assert from "node:assert/strict";
import type { ScheduleSpec } from "../contracts/schedule.js";
import { openDatabase } from "../db/client.js";
import { DatabaseStorage } from "../db/storage.js";
import { Outbox } from "../core/outbox.js";
import { ReminderScheduler } from "../services/scheduler.js";
import { ReminderSettings } from "./reminders.js";

const WEEKDAYS_9: ScheduleSpec = { times: ["09:00"], day_filter: "weekdays", timezone: "Europe/Moscow" };

function setup(
  options: {
    parsed?: ScheduleSpec | null;
    transcript?: string | null;
    authenticated?: boolean;
  } = {}
) {
  const handle = openDatabase(":memory:");
  const storage = new DatabaseStorage(handle.db);
  const scheduler = new ReminderScheduler({ onReminder: () => {} });
  const outbox = new Outbox();
  const parseCalls: Array<[string, string]> = [];
  const reminders = new ReminderSettings({
    storage,
    scheduler,
    sink: outbox,
    defaultTimezone: "Europe/Moscow",
    isAuthenticated: async () => options.authenticated ?? true,
    transcribe: async () => (options.transcript === undefined ? "каждый день в девять" : options.transcript),
    parseSchedule: async (text, timezone) => {
      parseCalls.push([text, timezone]);
      return options.parsed === undefined ? WEEKDAYS_9 : options.parsed;
    },
  });
  const close = () => {
    scheduler.shutdown();
    handle.close();
  };
  return { storage, scheduler, outbox, reminders, parseCalls, close };
}

test("setup asks for a timezone while the default is still set", async () => {
  const { reminders, storage, close } = setup();
  try {
    assert.deepEqual(await reminders.handle("u1", { type: "BEGIN_SETUP" }), [{ type: "ASK_TIMEZONE" }]);
    await storage.setTimezone("u1", "Asia/Tokyo");
    assert.deepEqual(await reminders.handle("u1", { type: "BEGIN_SETUP" }), [
      { type: "ASK_SCHEDULE", timezone: "Asia/Tokyo" },
    ]);
  } finally {
    close();
  }
});

test("a valid timezone is stored, an unknown one is refused", async () => {
  const { reminders, storage, close } = setup();
  try {
    assert.deepEqual(await reminders.handle("u1", { type: "SET_TIMEZONE", timezone: " Asia/Almaty " }), [
      { type: "ASK_SCHEDULE", timezone: "Asia/Almaty" },
    ]);
    assert.equal(await storage.getTimezone("u1"), "Asia/Almaty");

    assert.deepEqual(await reminders.handle("u1", { type: "SET_TIMEZONE", timezone: "Mars/Base" }), [
      { type: "TIMEZONE_INVALID", timezone: "Mars/Base" },
    ]);
    assert.equal(await storage.getTimezone("u1"), "Asia/Almaty");
  } finally {
    close();
  }
});

test("a parsed schedule is stored and scheduled", async () => {
  const { reminders, storage, scheduler, parseCalls, close } = setup();
  try {
    await storage.setTimezone("u1", "Europe/Moscow");
    assert.deepEqual(await reminders.handle("u1", { type: "SUBMIT_SCHEDULE", text: "по будням в 9 утра" }), [
      { type: "SCHEDULE_CONFIGURED", schedule: WEEKDAYS_9 },
    ]);
    assert.deepEqual(parseCalls, [["по будням в 9 утра", "Europe/Moscow"]]);
    assert.deepEqual(await storage.getReminderSchedule("u1"), WEEKDAYS_9);
    assert.deepEqual(
      scheduler.listJobs("u1").map((job) => job.pattern),
      ["0 9 * * 1-5"]
    );
  } finally {
    close();
  }
});

test("a schedule naming an unknown zone falls back to the user's zone", async () => {
  const { reminders, storage, close } = setup({
    parsed: { times: ["08:15"], day_filter: "all", timezone: "Nowhere/Land" },
  });
  try {
    await storage.setTimezone("u1", "Asia/Tokyo");
    assert.deepEqual(await reminders.handle("u1", { type: "SUBMIT_SCHEDULE", text: "в 8:15" }), [
      { type: "SCHEDULE_CONFIGURED", schedule: { times: ["08:15"], day_filter: "all", timezone: "Asia/Tokyo" } },
    ]);
  } finally {
    close();
  }
});

test("an unparseable schedule changes nothing", async () => {
  const { reminders, storage, scheduler, close } = setup({ parsed: null });
  try {
    assert.deepEqual(await reminders.handle("u1", { type: "SUBMIT_SCHEDULE", text: "когда-нибудь" }), [
      { type: "SCHEDULE_PARSE_FAILED" },
    ]);
    assert.equal(await storage.getReminderSchedule("u1"), null);
    assert.deepEqual(scheduler.listJobs("u1"), []);
  } finally {
    close();
  }
});

test("voice schedules wait for confirmation of the transcript", async () => {
  const { reminders, parseCalls, close } = setup();
  try {
    assert.deepEqual(
      await reminders.handle("u1", { type: "SUBMIT_SCHEDULE_VOICE", audio: new Uint8Array([1]) }),
      [{ type: "SCHEDULE_TRANSCRIBED", text: "каждый день в девять" }]
    );
    assert.deepEqual(parseCalls, []);

    assert.deepEqual(await reminders.handle("u1", { type: "CONFIRM_TRANSCRIPT" }), [
      { type: "SCHEDULE_CONFIGURED", schedule: WEEKDAYS_9 },
    ]);
    assert.deepEqual(parseCalls, [["каждый день в девять", "Europe/Moscow"]]);

    assert.deepEqual(await reminders.handle("u1", { type: "CONFIRM_TRANSCRIPT" }), [
      { type: "SHOW_NOTICE", notice: "unknown_command" },
    ]);
  } finally {
    close();
  }
});

test("cancelling a transcript asks for the schedule again", async () => {
  const { reminders, parseCalls, close } = setup();
  try {
    await reminders.handle("u1", { type: "SUBMIT_SCHEDULE_VOICE", audio: new Uint8Array([1]) });
    assert.deepEqual(await reminders.handle("u1", { type: "CANCEL_TRANSCRIPT" }), [
      { type: "ASK_SCHEDULE", timezone: "Europe/Moscow" },
    ]);
    assert.deepEqual(await reminders.handle("u1", { type: "CONFIRM_TRANSCRIPT" }), [
      { type: "SHOW_NOTICE", notice: "unknown_command" },
    ]);
    assert.deepEqual(parseCalls, []);
  } finally {
    close();
  }
});

test("an empty transcription is reported", async () => {
  const { reminders, close } = setup({ transcript: null });
  try {
    assert.deepEqual(
      await reminders.handle("u1", { type: "SUBMIT_SCHEDULE_VOICE", audio: new Uint8Array([1]) }),
      [{ type: "SHOW_NOTICE", notice: "transcription_failed" }]
    );
  } finally {
    close();
  }
});

test("view shows the stored schedule with its next run", async () => {
  const { reminders, close } = setup();
  try {
    assert.deepEqual(await reminders.handle("u1", { type: "VIEW" }), [{ type: "SCHEDULE_NONE" }]);
    await reminders.handle("u1", { type: "SUBMIT_SCHEDULE", text: "по будням в 9" });

    const [view] = await reminders.handle("u1", { type: "VIEW" });
    assert.equal(view?.type, "SCHEDULE_VIEW");
    if (view?.type !== "SCHEDULE_VIEW") return;
    assert.deepEqual(view.schedule, WEEKDAYS_9);
    assert.ok(view.nextRun, "expected a next run");
    const local = new Intl.DateTimeFormat("en-US", {
      timeZone: "Europe/Moscow",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    }).format(new Date(view.nextRun));
    assert.equal(local, "09:00");
  } finally {
    close();
  }
});

test("disable removes jobs and the stored schedule", async () => {
  const { reminders, storage, scheduler, close } = setup();
  try {
    await reminders.handle("u1", { type: "SUBMIT_SCHEDULE", text: "по будням в 9" });
    assert.deepEqual(await reminders.handle("u1", { type: "DISABLE" }), [{ type: "SCHEDULE_DISABLED" }]);
    assert.deepEqual(scheduler.listJobs("u1"), []);
    assert.equal(await storage.getReminderSchedule("u1"), null);
  } finally {
    close();
  }
});

test("reminder settings require authentication", async () => {
  const { reminders, outbox, close } = setup({ authenticated: false });
  try {
    assert.deepEqual(await reminders.handle("u1", { type: "VIEW" }), [{ type: "AUTH_REQUIRED" }]);
    assert.deepEqual(
      outbox.drain("u1").map((m) => m.directive.type),
      ["AUTH_REQUIRED"]
    );
  } finally {
    close();
  }
});
