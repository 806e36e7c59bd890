import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { MemorySyncEventSink, SyncEventLogger, createFileSinkFactory } from "../SyncEventLogger.js";

test("SyncEventLogger appends JSONL events in order", { concurrency: false }, async () => {
  const logDir = path.join(mkdtempSync(path.join(os.tmpdir(), "ctxsync-logs-")), "logs");
  const logger = new SyncEventLogger(logDir, "attempt-1");
  void logger.log("token_acquired");
  await logger.log("listener_bound", { port: 4312 });

  assert.equal(logger.logPath, path.join(logDir, "attempt-1.jsonl"));
  const lines = readFileSync(logger.logPath, "utf8").trim().split("\n");
  assert.equal(lines.length, 2);
  const first = JSON.parse(lines[0]);
  const second = JSON.parse(lines[1]);
  assert.equal(first.type, "token_acquired");
  assert.equal(first.attemptId, "attempt-1");
  assert.deepEqual(first.data, {});
  assert.equal(second.type, "listener_bound");
  assert.deepEqual(second.data, { port: 4312 });
});

test("SyncEventLogger reports write failures without rejecting", { concurrency: false }, async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "ctxsync-logs-"));
  const blocker = path.join(root, "blocked");
  writeFileSync(blocker, "not a directory");
  const failures: unknown[] = [];
  const logger = createFileSinkFactory(blocker, (error) => failures.push(error))("attempt-2");
  await logger.log("listener_bound");
  assert.equal(failures.length, 1);
});

test("MemorySyncEventSink keeps events", async () => {
  const sink = new MemorySyncEventSink();
  await sink.log("a");
  await sink.log("b", { ok: true });
  assert.deepEqual(sink.types(), ["a", "b"]);
  assert.deepEqual(sink.events[1], { type: "b", data: { ok: true } });
});
