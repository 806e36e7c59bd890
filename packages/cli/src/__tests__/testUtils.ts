import { promises as fs } from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";

export interface CapturedOutput {
  logs: string[];
  errors: string[];
}

export const captureConsole = async (
  fn: () => Promise<void> | void,
  onLog?: (line: string) => void,
): Promise<CapturedOutput> => {
  const output: CapturedOutput = { logs: [], errors: [] };
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (...args: unknown[]) => {
    const line = args.join(" ");
    output.logs.push(line);
    onLog?.(line);
  };
  console.error = (...args: unknown[]) => {
    output.errors.push(args.join(" "));
  };
  try {
    await fn();
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
  return output;
};

export const withTempHome = async (fn: (home: string) => Promise<void>): Promise<void> => {
  const originalHome = process.env.HOME;
  const originalExitCode = process.exitCode;
  const tempHome = await fs.mkdtemp(path.join(os.tmpdir(), "ctxsync-cli-"));
  process.env.HOME = tempHome;
  process.exitCode = undefined;
  try {
    await fn(tempHome);
  } finally {
    if (originalHome === undefined) {
      delete process.env.HOME;
    } else {
      process.env.HOME = originalHome;
    }
    process.exitCode = originalExitCode;
    await fs.rm(tempHome, { recursive: true, force: true });
  }
};

export type TestHandler = (req: http.IncomingMessage, res: http.ServerResponse, body: string) => void;

export const startServer = async (handler: TestHandler): Promise<{ baseUrl: string; close: () => Promise<void> }> => {
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => handler(req, res, Buffer.concat(chunks).toString("utf8")));
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Failed to bind test server");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
};

export const json = (res: http.ServerResponse, status: number, payload: unknown): void => {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
};
