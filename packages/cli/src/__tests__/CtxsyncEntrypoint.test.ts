import test from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { CtxsyncEntrypoint, USAGE, readCliVersion } from "../bin/CtxsyncEntrypoint.js";
import { captureConsole, withTempHome } from "./testUtils.js";

const packageVersion = (): string => {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  throw new Error("package.json has no version");
};

test("CtxsyncEntrypoint prints version", { concurrency: false }, async () => {
  const { logs } = await captureConsole(() => CtxsyncEntrypoint.run(["--version"]));
  assert.deepEqual(logs, [packageVersion()]);
  assert.equal(readCliVersion(), packageVersion());
});

test("CtxsyncEntrypoint prints usage for help and requires a command", { concurrency: false }, async () => {
  const { logs } = await captureConsole(() => CtxsyncEntrypoint.run(["help"]));
  assert.deepEqual(logs, [USAGE]);
  await assert.rejects(() => CtxsyncEntrypoint.run([]), { message: USAGE });
});

test("CtxsyncEntrypoint rejects unknown commands", { concurrency: false }, async () => {
  await assert.rejects(() => CtxsyncEntrypoint.run(["totally-unknown"]), { message: "Unknown command: totally-unknown" });
});

test("CtxsyncEntrypoint routes status to the sync commands", { concurrency: false }, async () => {
  await withTempHome(async () => {
    const { logs } = await captureConsole(() => CtxsyncEntrypoint.run(["status", "--json"]));
    assert.deepEqual(JSON.parse(logs.join("\n")), { synced: false });
  });
});

test("CtxsyncEntrypoint sub-command help prints usage", { concurrency: false }, async () => {
  const { logs } = await captureConsole(() => CtxsyncEntrypoint.run(["search", "--help"]));
  assert.ok(logs[0].startsWith("ctxsync search [<QUERY>]"));
});
