import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ExecutionRequest, ExecutionResult, TaskExecutorGateway } from "./types.js";

const logger = log.child("gateway");

/** Handles one operation in-process. Throwing marks the task failed. */
export type OperationHandler = (args: Record<string, unknown>, context: { taskId: string }) => Promise<unknown>;

export type FunctionTaskGatewayOptions = {
  handlers: Record<string, OperationHandler>;
  /** Used for operations with no handler of their own. */
  fallback?: OperationHandler;
  /** Timeout in ms (default: executor.timeoutMs) */
  timeout?: number;
};

class TimeoutError extends Error {}

/** Runs operations as local async functions instead of remote calls. */
export class FunctionTaskGateway implements TaskExecutorGateway {
  readonly name = "function";

  private handlers: Map<string, OperationHandler>;
  private fallback?: OperationHandler;
  private timeout: number;

  constructor(opts: FunctionTaskGatewayOptions) {
    this.handlers = new Map(Object.entries(opts.handlers));
    this.fallback = opts.fallback;
    this.timeout = opts.timeout ?? getConfig().executor.timeoutMs;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    const handler = this.handlers.get(request.operation) ?? this.fallback;
    if (!handler) {
      return {
        status: "error",
        error: `No handler for operation "${request.operation}"`,
        metadata: { durationMs: 0 },
      };
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      logger.debug(`Running ${request.operation} for task "${request.taskId}"`);
      const result = await Promise.race([
        handler(request.arguments, { taskId: request.taskId }),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new TimeoutError(`Timed out after ${this.timeout}ms`)), this.timeout);
        }),
      ]);
      return { status: "ok", result, metadata: { durationMs: Date.now() - start } };
    } catch (err) {
      logger.error(`Task "${request.taskId}" failed`, { error: errorMessage(err) });
      return {
        status: err instanceof TimeoutError ? "timeout" : "error",
        error: errorMessage(err),
        metadata: { durationMs: Date.now() - start },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
