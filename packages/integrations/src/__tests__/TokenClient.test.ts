import test from "node:test";
import assert from "node:assert/strict";
import { AuthError } from "@ctxsync/shared";
import { TokenClient } from "../auth/TokenClient.js";
import { startServer } from "./testServer.js";

test("TokenClient posts the session credential and returns the token", async () => {
  let seenAuth: string | undefined;
  let seenPath: string | undefined;
  let seenMethod: string | undefined;
  const server = await startServer((req, res) => {
    seenAuth = req.headers.authorization;
    seenPath = req.url;
    seenMethod = req.method;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ token: "tok123" }));
  });
  try {
    const client = new TokenClient({ apiBaseUrl: server.baseUrl, sessionToken: "test-session" });
    assert.equal(await client.acquire(), "tok123");
    assert.equal(seenAuth, "Bearer test-session");
    assert.equal(seenPath, "/api/v1/llm-token");
    assert.equal(seenMethod, "POST");
  } finally {
    await server.close();
  }
});

test("TokenClient fails with not_signed_in without a session credential", async () => {
  const client = new TokenClient({ apiBaseUrl: "http://127.0.0.1:9" });
  await assert.rejects(client.acquire(), (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.code, "not_signed_in");
    return true;
  });
});

test("TokenClient maps 401 to not_signed_in", async () => {
  const server = await startServer((_req, res) => {
    res.statusCode = 401;
    res.end("expired");
  });
  try {
    const client = new TokenClient({ apiBaseUrl: server.baseUrl, sessionToken: "test-session" });
    await assert.rejects(client.acquire(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.equal(error.code, "not_signed_in");
      assert.equal(error.message, "Unable to sync task: not signed in (token issuer returned 401).");
      return true;
    });
  } finally {
    await server.close();
  }
});

test("TokenClient maps server errors and malformed bodies to network", async () => {
  let mode: "error" | "empty" = "error";
  const server = await startServer((_req, res) => {
    if (mode === "error") {
      res.statusCode = 502;
      res.end("bad gateway");
      return;
    }
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ token: "" }));
  });
  try {
    const client = new TokenClient({ apiBaseUrl: server.baseUrl, sessionToken: "test-session" });
    await assert.rejects(client.acquire(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.equal(error.code, "network");
      assert.equal(error.message, "Failed to acquire sync token: token request failed (502): bad gateway");
      return true;
    });
    mode = "empty";
    await assert.rejects(client.acquire(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.equal(error.code, "network");
      return true;
    });
  } finally {
    await server.close();
  }
});

test("TokenClient maps connection failures to network", async () => {
  const server = await startServer((_req, res) => res.end());
  const { baseUrl } = server;
  await server.close();
  const client = new TokenClient({ apiBaseUrl: baseUrl, sessionToken: "test-session" });
  await assert.rejects(client.acquire(), (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.code, "network");
    return true;
  });
});

test("TokenClient keeps the path prefix of the API base URL", async () => {
  let seenPath: string | undefined;
  const server = await startServer((req, res) => {
    seenPath = req.url;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ token: "tok123" }));
  });
  try {
    const client = new TokenClient({ apiBaseUrl: `${server.baseUrl}/gateway/`, sessionToken: "test-session" });
    assert.equal(await client.acquire(), "tok123");
    assert.equal(seenPath, "/gateway/api/v1/llm-token");
  } finally {
    await server.close();
  }
});

test("TokenClient treats session errors in the body as not_signed_in", async () => {
  const server = await startServer((_req, res) => {
    res.statusCode = 500;
    res.end("invalid session");
  });
  try {
    const client = new TokenClient({ apiBaseUrl: server.baseUrl, sessionToken: "test-session" });
    await assert.rejects(client.acquire(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.equal(error.code, "not_signed_in");
      assert.equal(error.message, "Unable to sync task: not signed in (token issuer returned 500).");
      return true;
    });
  } finally {
    await server.close();
  }
});

test("TokenClient times out a response body that never finishes", async () => {
  const server = await startServer((_req, res) => {
    res.setHeader("Content-Type", "application/json");
    res.write('{"token":');
  });
  try {
    const client = new TokenClient({ apiBaseUrl: server.baseUrl, sessionToken: "test-session", timeoutMs: 100 });
    await assert.rejects(client.acquire(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.equal(error.code, "network");
      assert.match(error.message, /^Failed to acquire sync token: malformed token response: /);
      return true;
    });
  } finally {
    await server.close();
  }
});
