import test from "node:test";
import assert from "node:assert/strict";
import { SystemBrowserLauncher, resolveOpenCommand } from "../system/SystemBrowserLauncher.js";

test("resolveOpenCommand picks the platform opener", () => {
  const url = "https://app.example.test/home/ide?token=t&callback_port=1";
  assert.deepEqual(resolveOpenCommand(url, "darwin"), { command: "open", args: [url] });
  assert.deepEqual(resolveOpenCommand(url, "linux"), { command: "xdg-open", args: [url] });
  assert.deepEqual(resolveOpenCommand(url, "win32"), {
    command: "cmd",
    args: ["/c", "start", "", "https://app.example.test/home/ide?token=t^&callback_port=1"],
  });
});

test("SystemBrowserLauncher reports spawn failures without throwing", () => {
  const launcher = new SystemBrowserLauncher("linux", () => {
    throw new Error("spawn EACCES");
  });
  const errors: string[] = [];
  launcher.open("https://app.example.test", (error) => errors.push(error.message));
  assert.deepEqual(errors, ["spawn EACCES"]);
});
