import type { AgentRegistry } from "../agents/registry.js";
import type { Agent } from "../agents/types.js";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { operationFor } from "../gateway/operations.js";
import type { ExecutionResult, TaskExecutorGateway } from "../gateway/types.js";
import { readiness } from "../planner/task-graph.js";
import type { Task } from "../planner/types.js";
import { snapshotTask } from "../planner/workflow-status.js";
import { log } from "../utils/logger.js";
import { DependencyResolver } from "./dependency-resolver.js";
import type { PriorityQueue } from "./priority-queue.js";
import type { TaskStore } from "./task-store.js";
import type { EventListener, OrchestratorEvent, TickReport } from "./types.js";

const logger = log.child("scheduler");

export type SchedulerOptions = {
  store: TaskStore;
  agents: AgentRegistry;
  queue: PriorityQueue<string>;
  gateway: TaskExecutorGateway;
  resolver?: DependencyResolver;
  tickIntervalMs?: number;
  heartbeatIntervalMs?: number;
  errorBackoffMs?: number;
  warnEveryAttempts?: number;
  emit?: EventListener;
  /** Clock used for task and heartbeat timestamps. */
  now?: () => number;
};

/**
 * Moves tasks from the queue onto agents. Everything that reads and then
 * writes a task, an agent or the queue runs synchronously on the event loop,
 * so a task is never dispatched twice and an agent never claimed twice.
 * Dispatched work runs as its own promise and is never awaited by the loop.
 */
export class Scheduler {
  private readonly store: TaskStore;
  private readonly agents: AgentRegistry;
  private readonly queue: PriorityQueue<string>;
  private readonly gateway: TaskExecutorGateway;
  private readonly resolver: DependencyResolver;
  private readonly tickIntervalMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly errorBackoffMs: number;
  private readonly warnEveryAttempts: number;
  private readonly listener: EventListener;
  private readonly now: () => number;

  private running = false;
  private tickTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private inflight = new Set<Promise<void>>();

  constructor(opts: SchedulerOptions) {
    const config = getConfig().scheduler;
    this.store = opts.store;
    this.agents = opts.agents;
    this.queue = opts.queue;
    this.gateway = opts.gateway;
    this.resolver = opts.resolver ?? new DependencyResolver(opts.store);
    this.tickIntervalMs = opts.tickIntervalMs ?? config.tickIntervalMs;
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs ?? config.heartbeatIntervalMs;
    this.errorBackoffMs = opts.errorBackoffMs ?? config.errorBackoffMs;
    this.warnEveryAttempts = opts.warnEveryAttempts ?? config.warnEveryAttempts;
    this.listener = opts.emit ?? (() => {});
    this.now = opts.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler already running");
      return;
    }
    this.running = true;
    this.heartbeatTimer = setInterval(() => this.agents.heartbeat(this.now()), this.heartbeatIntervalMs);
    logger.info("Scheduler started", { tickIntervalMs: this.tickIntervalMs });
    this.scheduleNext(0);
  }

  /** Stop ticking. Tasks already dispatched still finish. */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.tickTimer) clearTimeout(this.tickTimer);
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.tickTimer = null;
    this.heartbeatTimer = null;
    logger.info("Scheduler stopped", { inflight: this.inflight.size });
  }

  /**
   * One pass over the queue in priority order. Every ready task that an
   * agent can take is dispatched; the rest go back at their old priority.
   */
  tick(): TickReport {
    const report: TickReport = { dispatched: [], deferred: [], dropped: [] };
    const putBack: Array<{ id: string; priority: number }> = [];
    const seen = new Set<string>();
    const lookup = (id: string) => this.store.get(id);

    try {
      for (let entry = this.queue.pop(); entry; entry = this.queue.pop()) {
        const { value: taskId, priority } = entry;
        const task = this.store.get(taskId);
        if (!task || task.status !== "pending" || seen.has(taskId)) {
          report.dropped.push(taskId);
          continue;
        }
        seen.add(taskId);

        const state = readiness(task, lookup);
        if (state.state === "blocked") {
          logger.warn(`Task "${task.id}" can never run`, { reason: state.reason });
          report.dropped.push(taskId);
          this.emit({ type: "task:blocked", taskId, reason: state.reason });
          continue;
        }
        if (state.state === "waiting") {
          putBack.push({ id: taskId, priority });
          report.deferred.push(taskId);
          continue;
        }

        const agent = this.agents.select(task.type);
        if (!agent) {
          task.dispatchAttempts++;
          if (task.dispatchAttempts === 1 || task.dispatchAttempts % this.warnEveryAttempts === 0) {
            logger.warn(`No available agent for task "${task.id}"`, {
              type: task.type,
              attempts: task.dispatchAttempts,
            });
          }
          putBack.push({ id: taskId, priority });
          report.deferred.push(taskId);
          continue;
        }

        this.dispatch(task, agent);
        report.dispatched.push(taskId);
      }
    } finally {
      for (const { id, priority } of putBack) {
        this.queue.push(id, priority);
      }
    }
    return report;
  }

  /** Resolves once every dispatched task has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  /**
   * Tick and drain until a tick dispatches nothing and nothing is in
   * flight. Returns the number of ticks taken.
   */
  async runUntilIdle(maxTicks = 100): Promise<number> {
    let ticks = 0;
    while (ticks < maxTicks) {
      const report = this.tick();
      ticks++;
      if (report.dispatched.length === 0 && this.inflight.size === 0) break;
      await this.drain();
    }
    return ticks;
  }

  private scheduleNext(delayMs: number): void {
    this.tickTimer = setTimeout(() => this.loop(), delayMs);
  }

  private loop(): void {
    if (!this.running) return;
    let delay = this.tickIntervalMs;
    try {
      this.tick();
    } catch (err) {
      logger.error("Tick failed", { error: errorMessage(err) });
      delay = this.errorBackoffMs;
    }
    if (this.running) this.scheduleNext(delay);
  }

  private dispatch(task: Task, agent: Agent): void {
    // Claim before anything can yield, so no other tick sees the agent free.
    this.agents.claim(agent.id, task.id);
    this.store.markRunning(task.id, agent.id, this.now());
    logger.info(`Assigned "${task.id}" to ${agent.name}`, { agent: agent.id, type: task.type });
    this.emit({ type: "task:started", task: snapshotTask(task) });

    const run: Promise<void> = this.execute(task, agent.id).finally(() => {
      this.inflight.delete(run);
    });
    this.inflight.add(run);
  }

  private async execute(task: Task, agentId: string): Promise<void> {
    const start = this.now();
    let result: ExecutionResult;
    try {
      result = await this.gateway.execute({
        taskId: task.id,
        operation: operationFor(task.type),
        arguments: { ...task.parameters },
      });
    } catch (err) {
      result = { status: "error", error: errorMessage(err), metadata: { durationMs: this.now() - start } };
    }

    try {
      this.settle(task.id, agentId, result);
    } catch (err) {
      logger.error(`Could not record outcome of "${task.id}"`, { error: errorMessage(err) });
    }
  }

  /** Completion handler: record the outcome, free the agent, feed dependents. */
  private settle(taskId: string, agentId: string, result: ExecutionResult): void {
    const task = this.record(taskId, agentId, result);

    if (task.status === "failed") {
      logger.error(`Task "${taskId}" failed`, { error: task.error, status: result.status });
      this.emit({ type: "task:failed", task: snapshotTask(task) });
      return;
    }

    logger.info(`Task "${taskId}" completed`, { durationMs: result.metadata.durationMs });
    const resolved = this.resolver.resolve(task);
    this.emit({ type: "task:completed", task: snapshotTask(task) });
    for (const r of resolved) {
      this.emit({ type: "task:resolved", taskId: r.taskId, param: r.param, sourceTaskId: task.id });
    }
  }

  private emit(event: OrchestratorEvent): void {
    try {
      this.listener(event);
    } catch (err) {
      logger.error("Event listener failed", { event: event.type, error: errorMessage(err) });
    }
  }

  private record(taskId: string, agentId: string, result: ExecutionResult): Task {
    try {
      return result.status === "ok"
        ? this.store.complete(taskId, result.result, this.now())
        : this.store.fail(taskId, result.error, this.now());
    } finally {
      this.agents.release(agentId, taskId);
    }
  }
}
