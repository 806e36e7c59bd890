import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ContextSnapshotFile, decodeSnapshot } from "../ContextSnapshotFile.js";
import { SyncedContextStore } from "../SyncedContextStore.js";

const makePath = (): string =>
  path.join(mkdtempSync(path.join(os.tmpdir(), "ctxsync-snapshot-")), "nested", "context.json");

const context = {
  account_id: "acc-1",
  account_name: "Acme",
  product_id: "prod-1",
  product_name: "Widget",
  board_id: "board-1",
  big_bet: "Onboarding",
  synced_at: new Date("2026-02-03T04:05:06.000Z"),
};

test("ContextSnapshotFile mirrors store changes to disk", { concurrency: false }, async () => {
  const filePath = makePath();
  const snapshot = new ContextSnapshotFile(filePath);
  const store = new SyncedContextStore();
  const detach = snapshot.attach(store);

  store.set(context);
  await snapshot.flush();
  const saved = JSON.parse(readFileSync(filePath, "utf8"));
  assert.equal(saved.synced_at, "2026-02-03T04:05:06.000Z");
  assert.equal(saved.big_bet, "Onboarding");
  assert.deepEqual(await snapshot.load(), context);

  store.clear();
  await snapshot.flush();
  assert.equal(existsSync(filePath), false);
  assert.equal(await snapshot.load(), undefined);

  detach();
  store.set(context);
  await snapshot.flush();
  assert.equal(existsSync(filePath), false);
});

test("ContextSnapshotFile ignores malformed files", { concurrency: false }, async () => {
  const filePath = path.join(mkdtempSync(path.join(os.tmpdir(), "ctxsync-snapshot-")), "context.json");
  writeFileSync(filePath, "{not json");
  assert.equal(await new ContextSnapshotFile(filePath).load(), undefined);
  writeFileSync(filePath, JSON.stringify({ account_id: 1, synced_at: "2026-01-01T00:00:00.000Z" }));
  assert.equal(await new ContextSnapshotFile(filePath).load(), undefined);
});

test("decodeSnapshot rejects invalid dates and optional field types", () => {
  const base = {
    account_id: "a",
    account_name: "",
    product_id: "p",
    product_name: "",
    board_id: "b",
  };
  assert.equal(decodeSnapshot({ ...base, synced_at: "yesterday" }), undefined);
  assert.equal(decodeSnapshot({ ...base, synced_at: "2026-01-01T00:00:00.000Z", task_id: 7 }), undefined);
  assert.deepEqual(decodeSnapshot({ ...base, synced_at: "2026-01-01T00:00:00.000Z", task_id: "t" }), {
    ...base,
    task_id: "t",
    synced_at: new Date("2026-01-01T00:00:00.000Z"),
  });
});
