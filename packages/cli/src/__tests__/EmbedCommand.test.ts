import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";
import { EmbedCommand, parseEmbedArgs } from "../commands/embed/EmbedCommand.js";
import { captureConsole, json, startServer, withTempHome } from "./testUtils.js";

test("parseEmbedArgs collects texts and the model override", () => {
  const parsed = parseEmbedArgs(["first", "--model", "tiny-embed", "second", "--json"]);
  assert.deepEqual(parsed.texts, ["first", "second"]);
  assert.equal(parsed.model, "tiny-embed");
  assert.deepEqual(parsed.config.cli, { embedding: { model: "tiny-embed" } });
  assert.equal(parsed.config.json, true);
  assert.throws(() => parseEmbedArgs(["--dims"]), { message: "Unknown option for embed: --dims" });
});

test("embed requires input texts", async () => {
  await assert.rejects(EmbedCommand.run([]), {
    message: "No input texts. Pass text arguments or --file <PATH>.",
  });
});

test("embed sends arguments and file lines to the embeddings endpoint", { concurrency: false }, async () => {
  await withTempHome(async (home) => {
    const bodies: unknown[] = [];
    const server = await startServer((req, res, body) => {
      if (req.url === "/api/v1/llm-token") {
        json(res, 200, { token: "tok123" });
        return;
      }
      if (req.url === "/embeddings" && req.headers.authorization === "Bearer tok123") {
        bodies.push(JSON.parse(body));
        json(res, 200, {
          data: [
            { embedding: [0.1, 0.2] },
            { embedding: [0.3, 0.4] },
            { embedding: [0.5, 0.6] },
          ],
        });
        return;
      }
      json(res, 404, { error: "not found" });
    });
    const inputFile = path.join(home, "inputs.txt");
    await fs.writeFile(inputFile, "from file\n\n  second line  \n", "utf8");
    try {
      const { logs } = await captureConsole(() =>
        EmbedCommand.run([
          "inline text",
          "--file",
          inputFile,
          "--model",
          "tiny-embed",
          "--api-base-url",
          server.baseUrl,
          "--session-token",
          "test-session",
        ]),
      );
      assert.deepEqual(logs, ["Embedded 3 texts with tiny-embed (2 dimensions)"]);
      assert.deepEqual(bodies, [{ model: "tiny-embed", input: ["inline text", "from file", "second line"] }]);
    } finally {
      await server.close();
    }
  });
});
