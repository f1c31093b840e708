import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { getConfig } from "../config.js";
import { errorMessage, OrchestratorError, ValidationError } from "../errors.js";
import type { Orchestrator } from "../orchestrator.js";
import type { WorkflowStore } from "../persistence/store.js";
import { CreateWorkflowRequestSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import type {
  ApiError,
  ApiErrorCode,
  CreateWorkflowResponse,
  ExecutorHealthResponse,
  HealthResponse,
  SSEEvent,
} from "./types.js";

const logger = log.child("api");

export type ApiServerOptions = {
  orchestrator: Orchestrator;
  port?: number;
  host?: string;
  /** When set, `GET /api/history` reads workflows from here. */
  workflowStore?: WorkflowStore;
};

export class ApiServer {
  private orchestrator: Orchestrator;
  private port: number;
  private host: string;
  private server: Server | null = null;
  private workflowStore?: WorkflowStore;
  private sseClients = new Set<ServerResponse>();
  private unsubscribe: (() => void) | null = null;

  constructor(opts: ApiServerOptions) {
    this.orchestrator = opts.orchestrator;
    this.port = opts.port ?? getConfig().server.port;
    this.host = opts.host ?? getConfig().server.host;
    this.workflowStore = opts.workflowStore;
  }

  async start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        logger.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) {
          sendError(res, 500, "INTERNAL", "Internal server error");
        }
      });
    });
    this.server = server;
    this.unsubscribe = this.orchestrator.onEvent((event) => this.broadcastSSE(event));

    return new Promise((resolve, reject) => {
      server.on("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        logger.info(`API listening on http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const client of this.sseClients) {
      client.end();
    }
    this.sseClients.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    // CORS
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (method === "GET" && pathname === "/api/health") {
        return this.handleHealth(res);
      }
      if (method === "GET" && pathname === "/api/executor/health") {
        return await this.handleExecutorHealth(res);
      }
      if (method === "GET" && pathname === "/api/events") {
        return this.handleSSE(req, res);
      }
      if (method === "GET" && pathname === "/api/agents") {
        return json(res, 200, this.orchestrator.getAgentStatus());
      }
      if (method === "GET" && pathname === "/api/queue") {
        return json(res, 200, this.orchestrator.getTaskQueueStatus());
      }
      if (method === "GET" && pathname === "/api/workflow-types") {
        return json(res, 200, this.orchestrator.workflowTypes());
      }
      if (method === "GET" && pathname === "/api/workflows") {
        return json(res, 200, this.orchestrator.listWorkflows());
      }
      if (method === "POST" && pathname === "/api/workflows") {
        return await this.handleCreateWorkflow(req, res);
      }
      if (method === "GET" && pathname === "/api/history") {
        return this.handleHistory(res, url.searchParams.get("limit"));
      }

      const workflowMatch = pathname.match(/^\/api\/workflows\/([^/]+)$/);
      if (method === "GET" && workflowMatch) {
        return json(res, 200, this.orchestrator.getWorkflowStatus(decodePathSegment(workflowMatch[1])));
      }

      const taskMatch = pathname.match(/^\/api\/tasks\/([^/]+)$/);
      if (method === "GET" && taskMatch) {
        return json(res, 200, this.orchestrator.getTask(decodePathSegment(taskMatch[1])));
      }
    } catch (err) {
      if (err instanceof OrchestratorError) {
        return sendError(res, statusFor(err), err.code, err.message);
      }
      throw err;
    }

    sendError(res, 404, "NOT_FOUND", "Not found");
  }

  private handleHealth(res: ServerResponse): void {
    const body: HealthResponse = {
      ok: true,
      scheduler: {
        running: this.orchestrator.scheduler.isRunning,
        inflight: this.orchestrator.scheduler.inflightCount,
      },
      agents: this.orchestrator.getAgentStatus().counts,
      queue: this.orchestrator.getTaskQueueStatus(),
    };
    json(res, 200, body);
  }

  private async handleExecutorHealth(res: ServerResponse): Promise<void> {
    const gateway = this.orchestrator.gateway;
    const body: ExecutorHealthResponse = {
      gateway: gateway.name,
      healthy: gateway.healthCheck ? await gateway.healthCheck() : null,
    };
    json(res, 200, body);
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleHistory(res: ServerResponse, limit: string | null): void {
    if (!this.workflowStore) {
      sendError(res, 404, "NOT_FOUND", "History is not enabled");
      return;
    }
    const n = limit ? Number.parseInt(limit, 10) : 50;
    json(res, 200, this.workflowStore.summaries(Number.isFinite(n) && n > 0 ? n : 50));
  }

  private async handleCreateWorkflow(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      sendError(res, 400, "INVALID_JSON", "Invalid JSON body");
      return;
    }

    const request = parseOrThrow(CreateWorkflowRequestSchema, raw, "workflow request");
    const workflowId = this.orchestrator.createWorkflow(request.type, request.parameters, request.priority);
    const response: CreateWorkflowResponse = { workflowId };
    json(res, 201, response);
  }

  private broadcastSSE(event: SSEEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError("VALIDATION_FAILED", `Malformed path segment "${segment}"`);
  }
}

function statusFor(err: OrchestratorError): number {
  switch (err.code) {
    case "WORKFLOW_NOT_FOUND":
    case "TASK_NOT_FOUND":
    case "AGENT_NOT_FOUND":
      return 404;
    default:
      return 400;
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, status: number, code: ApiErrorCode, message: string): void {
  const body: ApiError = { error: message, code };
  json(res, status, body);
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
