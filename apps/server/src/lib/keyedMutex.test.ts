import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { KeyedMutex } from "./keyedMutex.js";

test("tasks with the same key never overlap", async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  const task = (name: string, delayMs: number) => async () => {
    events.push(`${name}:start`);
    await sleep(delayMs);
    events.push(`${name}:end`);
    return name;
  };

  const results = await Promise.all([mutex.run("alice", task("a1", 20)), mutex.run("alice", task("a2", 1))]);
  assert.deepEqual(results, ["a1", "a2"]);
  assert.deepEqual(events, ["a1:start", "a1:end", "a2:start", "a2:end"]);
  assert.equal(mutex.pendingKeys, 0);
});

test("different keys run independently", async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  const slow = mutex.run("alice", async () => {
    await sleep(20);
    events.push("alice");
  });
  const fast = mutex.run("bob", async () => {
    events.push("bob");
  });
  await Promise.all([slow, fast]);
  assert.deepEqual(events, ["bob", "alice"]);
});

test("a failing task rejects its caller and releases the key", async () => {
  const mutex = new KeyedMutex();
  const failing = mutex.run("alice", async () => {
    throw new Error("store unavailable");
  });
  const next = mutex.run("alice", async () => "ran");
  await assert.rejects(failing, /store unavailable/);
  assert.equal(await next, "ran");
  assert.equal(mutex.pendingKeys, 0);
});
