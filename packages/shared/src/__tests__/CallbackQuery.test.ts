import test from "node:test";
import assert from "node:assert/strict";
import { encodeCallbackQuery, parseCallbackQuery } from "../context/CallbackQuery.js";
import type { SyncedContext } from "../context/SyncedContext.js";
import { missingCoreKeys, serializeSearchFilter } from "../context/SyncedContext.js";

const stamp = new Date("2026-03-02T10:00:00.000Z");

test("parseCallbackQuery maps recognized keys and percent-decodes values", () => {
  const context = parseCallbackQuery(
    "account_id=acc%2F1&product_id=p1&board_id=b%201&task_id=t1&task_name=Fix+bug&board_name=Q3%20Launch",
    stamp,
  );
  assert.equal(context.account_id, "acc/1");
  assert.equal(context.product_id, "p1");
  assert.equal(context.board_id, "b 1");
  assert.equal(context.task_id, "t1");
  assert.equal(context.work_item, "Fix bug");
  assert.equal(context.big_bet, "Q3 Launch");
  assert.equal(context.synced_at, stamp);
});

test("parseCallbackQuery leaves task fields absent without task_id", () => {
  const context = parseCallbackQuery("account_id=a1&product_id=p1&board_id=b1", stamp);
  assert.equal("task_id" in context, false);
  assert.equal(context.work_item, undefined);
  assert.deepEqual(missingCoreKeys(context), []);
});

test("parseCallbackQuery defaults missing core ids to empty strings and ignores unknown keys", () => {
  const context = parseCallbackQuery("product_id=p1&utm_source=mail&synced_at=1999-01-01", stamp);
  assert.equal(context.account_id, "");
  assert.equal(context.board_id, "");
  assert.equal(context.synced_at, stamp);
  assert.equal("utm_source" in context, false);
  assert.deepEqual(missingCoreKeys(context), ["account_id", "board_id"]);
});

test("parseCallbackQuery keeps the last value of a repeated key", () => {
  const context = parseCallbackQuery("board_id=first&board_id=second", stamp);
  assert.equal(context.board_id, "second");
});

test("encodeCallbackQuery output parses back into an equal context", () => {
  const original: SyncedContext = {
    account_id: "a1",
    account_name: "Acme & Co",
    product_id: "p1",
    product_name: "Desk",
    board_id: "b1",
    big_bet: "Q3 Launch",
    big_bet_description: "Ship 100% of scope",
    task_id: "t1",
    work_item: "Fix bug",
    work_item_description: "Crash on save?",
    synced_at: new Date("2020-01-01T00:00:00.000Z"),
  };
  const parsed = parseCallbackQuery(encodeCallbackQuery(original).toString(), stamp);
  assert.deepEqual(parsed, { ...original, synced_at: stamp });
});

test("serializeSearchFilter omits unset and empty fields and renames search_type", () => {
  const wire = serializeSearchFilter({
    search_type: "tasks",
    content_type: "",
    account_id: "a1",
    board_id: undefined,
  });
  assert.deepEqual(wire, { type: "tasks", account_id: "a1" });
});
