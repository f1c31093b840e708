import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { ExecutorResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { ExecutionRequest, ExecutionResult, TaskExecutorGateway } from "./types.js";

const logger = log.child("gateway");

export type HttpTaskGatewayOptions = {
  /** Base URL of the executor, e.g. http://127.0.0.1:5000 */
  url?: string;
  /** Path of the call endpoint (default: /call) */
  callPath?: string;
  headers?: Record<string, string>;
  /** Timeout in ms (default: 60000) */
  timeout?: number;
};

/** Sends each task to a remote executor as `POST /call { tool, arguments }`. */
export class HttpTaskGateway implements TaskExecutorGateway {
  readonly name = "http";

  private url: string;
  private callPath: string;
  private headers: Record<string, string>;
  private timeout: number;

  constructor(opts: HttpTaskGatewayOptions = {}) {
    const config = getConfig().executor;
    this.url = (opts.url ?? config.url).replace(/\/$/, "");
    this.callPath = opts.callPath ?? config.callPath;
    this.headers = opts.headers ?? {};
    this.timeout = opts.timeout ?? config.timeoutMs;
  }

  get endpoint(): string {
    return `${this.url}${this.callPath}`;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      logger.debug(`Calling ${request.operation} for task "${request.taskId}"`);

      const res = await fetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({ tool: request.operation, arguments: request.arguments }),
        signal: controller.signal,
      });
      const body = await res.text();

      if (!res.ok) {
        return {
          status: "error",
          error: `HTTP ${res.status}: ${body.slice(0, 500)}`,
          metadata: { durationMs: Date.now() - start, httpStatus: res.status },
        };
      }

      let raw: unknown;
      try {
        raw = JSON.parse(body);
      } catch {
        return {
          status: "error",
          error: "Executor returned invalid JSON",
          metadata: { durationMs: Date.now() - start, httpStatus: res.status },
        };
      }

      const parsed = ExecutorResponseSchema.safeParse(raw);
      if (!parsed.success) {
        return {
          status: "error",
          error: `Executor returned an unexpected body: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
          metadata: { durationMs: Date.now() - start, httpStatus: res.status },
        };
      }
      if (!parsed.data.success) {
        return {
          status: "error",
          error: parsed.data.error ?? "Executor reported failure",
          metadata: { durationMs: Date.now() - start, httpStatus: res.status },
        };
      }
      return {
        status: "ok",
        result: parsed.data.result ?? null,
        metadata: { durationMs: Date.now() - start, httpStatus: res.status },
      };
    } catch (err) {
      const isTimeout = controller.signal.aborted;
      logger.error(`Task "${request.taskId}" call failed`, { error: errorMessage(err) });
      return {
        status: isTimeout ? "timeout" : "error",
        error: isTimeout ? `Timed out after ${this.timeout}ms` : errorMessage(err),
        metadata: { durationMs: Date.now() - start },
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "GET",
        signal: AbortSignal.timeout(getConfig().executor.healthTimeoutMs),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
