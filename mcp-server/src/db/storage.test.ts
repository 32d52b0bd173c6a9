import test from "node:test";
import assert from "node:assert/strict";
import { StorageError } from "../core/errors.js";
import { openDatabase } from "./client.js";
import { DatabaseStorage, type NewEntry } from "./storage.js";

function withStorage(now = () => new Date("2026-10-18T09:00:00.000Z")) {
  const handle = openDatabase(":memory:");
  return { storage: new DatabaseStorage(handle.db, now), close: handle.close };
}

function entry(userId: string, date: string, content: string): NewEntry {
  return {
    userId,
    date,
    content,
    attitude: "интерес",
    form: "Да-принимающее",
    body: "тепло в груди",
    response: "стало легче",
  };
}

test("users start unauthenticated in the default timezone", async () => {
  const { storage, close } = withStorage();
  try {
    const user = await storage.ensureUser("u1");
    assert.equal(user.isAuthenticated, false);
    assert.equal(user.timezone, "Europe/Moscow");
    assert.equal(user.reminderSchedule, null);
    assert.equal(await storage.isAuthenticated("u1"), false);
    assert.equal(await storage.isAuthenticated("unknown"), false);
    assert.equal(await storage.getTimezone("unknown"), "Europe/Moscow");
  } finally {
    close();
  }
});

test("first authentication date is set once", async () => {
  let clock = new Date("2026-10-18T09:00:00.000Z");
  const { storage, close } = withStorage(() => clock);
  try {
    await storage.setAuthenticated("u1", true);
    clock = new Date("2026-10-20T10:00:00.000Z");
    await storage.setAuthenticated("u1", true);

    const user = await storage.getUser("u1");
    assert.equal(user?.isAuthenticated, true);
    assert.equal(user?.firstAuthDate, "2026-10-18T09:00:00.000Z");
    assert.equal(user?.lastActive, "2026-10-20T10:00:00.000Z");
  } finally {
    close();
  }
});

test("entries list newest first and count per user", async () => {
  const { storage, close } = withStorage();
  try {
    const first = await storage.createEntry(entry("u1", "2026-10-17T08:00:00.000Z", "старое"));
    const second = await storage.createEntry(entry("u1", "2026-10-18T08:00:00.000Z", "новое"));
    await storage.createEntry(entry("u2", "2026-10-18T08:30:00.000Z", "чужое"));

    assert.equal(second, first + 1);
    const listed = await storage.listEntries("u1");
    assert.deepEqual(
      listed.map((e) => e.content),
      ["новое", "старое"]
    );
    assert.equal(await storage.countEntries("u1"), 2);
    assert.equal(await storage.countEntries("u2"), 1);

    const page = await storage.listEntries("u1", { limit: 1, offset: 1 });
    assert.deepEqual(
      page.map((e) => e.content),
      ["старое"]
    );
  } finally {
    close();
  }
});

test("an entry with a blank field is refused", async () => {
  const { storage, close } = withStorage();
  try {
    await assert.rejects(
      storage.createEntry({ ...entry("u1", "2026-10-18T08:00:00.000Z", "x"), body: " " }),
      (err: unknown) => err instanceof StorageError && err.message === "Invalid practice entry: body"
    );
    assert.equal(await storage.countEntries("u1"), 0);
  } finally {
    close();
  }
});

test("reminder schedules round-trip and are listed for restore", async () => {
  const { storage, close } = withStorage();
  try {
    const schedule = { times: ["09:00", "21:00"], day_filter: "weekdays" as const, timezone: "Asia/Tokyo" };
    await storage.setTimezone("u1", "Asia/Tokyo");
    await storage.setReminderSchedule("u1", schedule);
    await storage.ensureUser("u2");

    assert.deepEqual(await storage.getReminderSchedule("u1"), schedule);
    assert.equal(await storage.getReminderSchedule("u2"), null);
    assert.deepEqual(await storage.listUsersWithSchedules(), [{ userId: "u1", schedule, timezone: "Asia/Tokyo" }]);

    await storage.setReminderSchedule("u1", null);
    assert.equal(await storage.getReminderSchedule("u1"), null);
    assert.deepEqual(await storage.listUsersWithSchedules(), []);
  } finally {
    close();
  }
});

test("refusals are recorded with the current time", async () => {
  const { storage, close } = withStorage();
  try {
    await storage.createRefusal("u1");
    const refusals = await storage.listRefusals("u1");
    assert.equal(refusals.length, 1);
    assert.equal(refusals[0]?.date, "2026-10-18T09:00:00.000Z");
  } finally {
    close();
  }
});

test("clearUserData removes only that user's rows", async () => {
  const { storage, close } = withStorage();
  try {
    await storage.setAuthenticated("u1", true);
    await storage.createEntry(entry("u1", "2026-10-17T08:00:00.000Z", "a"));
    await storage.createEntry(entry("u1", "2026-10-18T08:00:00.000Z", "b"));
    await storage.createRefusal("u1");
    await storage.createEntry(entry("u2", "2026-10-18T08:00:00.000Z", "c"));

    assert.deepEqual(await storage.clearUserData("u1"), { entries: 2, refusals: 1 });
    assert.equal(await storage.countEntries("u1"), 0);
    assert.deepEqual(await storage.listRefusals("u1"), []);
    assert.equal(await storage.getUser("u1"), undefined);
    assert.equal(await storage.countEntries("u2"), 1);
  } finally {
    close();
  }
});
