import { spawn } from "node:child_process";

export interface BrowserLauncher {
  /** Fire-and-forget; failures are reported through `onError` only. */
  open(url: string, onError?: (error: Error) => void): void;
}

export interface OpenCommand {
  command: string;
  args: string[];
}

export const resolveOpenCommand = (url: string, platform: NodeJS.Platform = process.platform): OpenCommand => {
  if (platform === "darwin") return { command: "open", args: [url] };
  if (platform === "win32") return { command: "cmd", args: ["/c", "start", "", url.replace(/&/g, "^&")] };
  return { command: "xdg-open", args: [url] };
};

export class SystemBrowserLauncher implements BrowserLauncher {
  constructor(
    private platform: NodeJS.Platform = process.platform,
    private spawnFn: typeof spawn = spawn,
  ) {}

  open(url: string, onError?: (error: Error) => void): void {
    const { command, args } = resolveOpenCommand(url, this.platform);
    try {
      const child = this.spawnFn(command, args, { stdio: "ignore", detached: true });
      child.on("error", (error) => onError?.(error));
      child.unref();
    } catch (error) {
      onError?.(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
