import os from "node:os";
import path from "node:path";

/**
 * Resolves ctxsync state locations under the user's home directory.
 * Kept free of other layers so every package can use it.
 */
export class PathHelper {
  static getGlobalDir(): string {
    return path.join(os.homedir(), ".ctxsync");
  }

  static getContextSnapshotPath(): string {
    return path.join(this.getGlobalDir(), "context.json");
  }

  static getLogDir(): string {
    return path.join(this.getGlobalDir(), "logs");
  }
}
