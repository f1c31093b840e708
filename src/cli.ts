#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_AGENTS, loadAgentFile } from "./agents/defaults.js";
import { ApiServer } from "./api/server.js";
import { configure, getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { HttpTaskGateway } from "./gateway/http-gateway.js";
import { Orchestrator } from "./orchestrator.js";
import { WorkflowStore } from "./persistence/store.js";
import { ApiErrorBodySchema, WorkflowStatusViewSchema, type WorkflowStatusView } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
});

const program = new Command();

program
  .name("taskmesh")
  .description("Priority scheduler that routes workflow tasks to capable agents")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts: { debug?: boolean } = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function defaultServer(): string {
  const { host, port } = getConfig().server;
  return `http://${host}:${port}`;
}

function intArg(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

/** `key=value`; the value is taken as JSON when it parses, else as a string. */
function collectParam(value: string, previous: Record<string, unknown>): Record<string, unknown> {
  const eq = value.indexOf("=");
  if (eq <= 0) throw new InvalidArgumentError("Expected key=value.");
  const key = value.slice(0, eq);
  const text = value.slice(eq + 1);
  let parsed: unknown = text;
  try {
    parsed = JSON.parse(text);
  } catch {
    // plain string
  }
  return { ...previous, [key]: parsed };
}

async function api(server: string, path: string, init?: RequestInit): Promise<unknown> {
  const res = await fetch(`${server.replace(/\/$/, "")}${path}`, init);
  const text = await res.text();
  let body: unknown = null;
  try {
    body = text ? JSON.parse(text) : null;
  } catch {
    throw new Error(`Server returned ${res.status}: ${text.slice(0, 200)}`);
  }
  if (!res.ok) {
    const parsed = ApiErrorBodySchema.safeParse(body);
    throw new Error(parsed.success ? parsed.data.error : `Server returned ${res.status}`);
  }
  return body;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printStatus(view: WorkflowStatusView): void {
  console.log(`${view.workflowId} (${view.workflowType}): ${view.status}, ${view.progress}`);
  for (const task of view.tasks) {
    const agent = task.assignedAgent ? ` @${task.assignedAgent}` : "";
    const note = task.error ?? (task.blocked ? `blocked: ${task.blocked}` : "");
    console.log(`  [${task.status}] ${task.id} ${task.type}${agent}${note ? ` (${note})` : ""}`);
  }
}

function fail(err: unknown): void {
  console.error("Error:", errorMessage(err));
  process.exitCode = 1;
}

// --- serve ---
type ServeOptions = {
  port: number;
  host: string;
  executorUrl?: string;
  agents?: string;
  db?: string;
  history: boolean;
  tick?: number;
};

program
  .command("serve")
  .description("Run the scheduler and the HTTP API")
  .option("-p, --port <port>", "API port", intArg, getConfig().server.port)
  .option("--host <host>", "API host", getConfig().server.host)
  .option("-e, --executor-url <url>", "Base URL of the task executor")
  .option("-a, --agents <file>", "JSON file listing agents (default: built-in agents)")
  .option("--db <path>", "History database path")
  .option("--no-history", "Do not record workflows to the history database")
  .option("--tick <ms>", "Scheduler tick interval", intArg)
  .action(async (opts: ServeOptions) => {
    if (opts.tick !== undefined) configure({ scheduler: { tickIntervalMs: opts.tick } });
    const store = opts.history ? new WorkflowStore(opts.db) : undefined;
    const orch = new Orchestrator({
      gateway: new HttpTaskGateway({ url: opts.executorUrl }),
      agents: opts.agents ? loadAgentFile(opts.agents) : DEFAULT_AGENTS,
      store,
    });
    const server = new ApiServer({ orchestrator: orch, port: opts.port, host: opts.host, workflowStore: store });

    const addr = await server.start();
    orch.start();
    console.log(`API:      http://${addr.host}:${addr.port}`);
    console.log(`Executor: ${orch.gateway.name}`);
    console.log(`Agents:   ${orch.agents.ids().join(", ")}`);
    console.log("Press Ctrl+C to stop.\n");

    process.on("SIGINT", () => {
      Promise.all([server.stop(), orch.stop()])
        .then(() => store?.close())
        .then(
          () => process.exit(0),
          (err) => {
            console.error("Shutdown failed:", errorMessage(err));
            process.exit(1);
          },
        );
    });
  });

// --- create ---
type CreateOptions = {
  server: string;
  param: Record<string, unknown>;
  priority?: number;
};

program
  .command("create")
  .description("Create a workflow on a running server")
  .argument("<type>", "Workflow type")
  .option("-s, --server <url>", "Server URL", defaultServer())
  .option("-P, --param <key=value>", "Workflow parameter (repeatable)", collectParam, {})
  .option("--priority <n>", "Base priority (lower runs first)", intArg)
  .action(async (type: string, opts: CreateOptions) => {
    try {
      const body = await api(opts.server, "/api/workflows", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ type, parameters: opts.param, priority: opts.priority }),
      });
      printJson(body);
    } catch (err) {
      fail(err);
    }
  });

// --- status ---
type StatusOptions = {
  server: string;
  watch?: boolean;
  interval: number;
};

program
  .command("status")
  .description("Show a workflow's status")
  .argument("<workflowId>", "Workflow id")
  .option("-s, --server <url>", "Server URL", defaultServer())
  .option("-w, --watch", "Poll until the workflow completes or fails")
  .option("-i, --interval <ms>", "Poll interval", intArg, getConfig().cli.pollIntervalMs)
  .action(async (workflowId: string, opts: StatusOptions) => {
    try {
      let lastProgress = "";
      while (true) {
        const view = WorkflowStatusViewSchema.parse(
          await api(opts.server, `/api/workflows/${encodeURIComponent(workflowId)}`),
        );
        if (!opts.watch) {
          printStatus(view);
          return;
        }
        if (view.progress !== lastProgress || view.status !== "running") {
          printStatus(view);
          lastProgress = view.progress;
        }
        if (view.status !== "running") {
          if (view.status === "failed") process.exitCode = 1;
          return;
        }
        await new Promise((r) => setTimeout(r, opts.interval));
      }
    } catch (err) {
      fail(err);
    }
  });

// --- read-only views ---
for (const [name, path, description] of [
  ["agents", "/api/agents", "List agents and their status"],
  ["queue", "/api/queue", "Show task counts"],
  ["types", "/api/workflow-types", "List workflow types"],
  ["workflows", "/api/workflows", "List workflows on the server"],
] as const) {
  program
    .command(name)
    .description(description)
    .option("-s, --server <url>", "Server URL", defaultServer())
    .action(async (opts: { server: string }) => {
      try {
        printJson(await api(opts.server, path));
      } catch (err) {
        fail(err);
      }
    });
}

// --- history ---
program
  .command("history")
  .description("List recorded workflows from the history database")
  .option("--db <path>", "History database path")
  .option("-n, --limit <n>", "Number of workflows", intArg, 20)
  .action((opts: { db?: string; limit: number }) => {
    const store = new WorkflowStore(opts.db);
    try {
      const rows = store.summaries(opts.limit);
      if (rows.length === 0) {
        console.log("No workflows recorded.");
        return;
      }
      for (const w of rows) {
        console.log(`${new Date(w.createdAt).toISOString()}  ${w.workflowId}  ${w.workflowType}  ${w.status}  ${w.progress}`);
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
