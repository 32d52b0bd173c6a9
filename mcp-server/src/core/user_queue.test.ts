import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { KeyedSerialQueue } from "./user_queue.js";

test("tasks for one key run in submission order without overlap", async () => {
  const queue = new KeyedSerialQueue<string>();
  const log: string[] = [];
  let running = 0;

  const task = (name: string, ms: number) => async () => {
    running += 1;
    assert.equal(running, 1, "tasks overlapped");
    log.push(`start ${name}`);
    await sleep(ms);
    log.push(`end ${name}`);
    running -= 1;
    return name;
  };

  const results = await Promise.all([
    queue.run("u1", task("a", 15)),
    queue.run("u1", task("b", 1)),
    queue.run("u1", task("c", 5)),
  ]);

  assert.deepEqual(results, ["a", "b", "c"]);
  assert.deepEqual(log, ["start a", "end a", "start b", "end b", "start c", "end c"]);
});

test("different keys do not wait on each other", async () => {
  const queue = new KeyedSerialQueue<string>();
  const finished: string[] = [];

  const slow = queue.run("u1", async () => {
    await sleep(30);
    finished.push("u1");
  });
  const fast = queue.run("u2", async () => {
    await sleep(1);
    finished.push("u2");
  });

  await Promise.all([slow, fast]);
  assert.deepEqual(finished, ["u2", "u1"]);
});

test("a failing task rejects its own promise and the chain continues", async () => {
  const queue = new KeyedSerialQueue<string>();

  const failing = queue.run("u1", () => {
    throw new Error("boom");
  });
  const next = queue.run("u1", () => "after");

  await assert.rejects(failing, /boom/);
  assert.equal(await next, "after");
});

test("drain waits for tasks queued while draining", async () => {
  const queue = new KeyedSerialQueue<string>();
  const done: string[] = [];

  void queue.run("u1", async () => {
    await sleep(5);
    done.push("first");
    void queue.run("u1", async () => {
      await sleep(5);
      done.push("second");
    });
  });

  await queue.drain("u1");
  assert.deepEqual(done, ["first", "second"]);
  assert.equal(queue.isBusy("u1"), false);
});

test("isBusy is false for keys with nothing queued", async () => {
  const queue = new KeyedSerialQueue<string>();
  assert.equal(queue.isBusy("nobody"), false);
  await queue.drain("nobody");
});
