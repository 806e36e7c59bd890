import type { SyncEventSink } from "../sync/SyncEventLogger.js";

export interface ToolContext {
  callId?: string;
  events?: SyncEventSink;
}

export interface ToolHandlerResult {
  output: string;
  data?: unknown;
}

export interface ToolExecutionResult extends ToolHandlerResult {
  ok: boolean;
  error?: string;
}

export type ToolHandler = (args: unknown, context: ToolContext) => Promise<ToolHandlerResult>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
  /** One-line label shown while the call runs. */
  describe?: (args: unknown) => string;
  handler: ToolHandler;
}
