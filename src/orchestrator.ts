import { DEFAULT_AGENTS } from "./agents/defaults.js";
import { AgentRegistry, snapshotAgent } from "./agents/registry.js";
import type { AgentCounts, AgentDescriptor, AgentSnapshot } from "./agents/types.js";
import { getConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { PriorityQueue } from "./executor/priority-queue.js";
import { Scheduler } from "./executor/scheduler.js";
import { TaskStore } from "./executor/task-store.js";
import type { EventListener, OrchestratorEvent } from "./executor/types.js";
import { HttpTaskGateway } from "./gateway/http-gateway.js";
import type { TaskExecutorGateway } from "./gateway/types.js";
import type { WorkflowStore } from "./persistence/store.js";
import { WorkflowPlanner } from "./planner/planner.js";
import { readiness } from "./planner/task-graph.js";
import type {
  BlockedReason,
  Task,
  TaskParameters,
  TaskSnapshot,
  TaskType,
  WorkflowDefinition,
  WorkflowStatusReport,
  WorkflowSummary,
} from "./planner/types.js";
import { buildStatusReport, snapshotTask, summarizeWorkflow } from "./planner/workflow-status.js";
import { log } from "./utils/logger.js";

const logger = log.child("orchestrator");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AgentStatusReport = {
  agents: AgentSnapshot[];
  counts: AgentCounts;
};

export type TaskQueueStatus = {
  /** Entries currently waiting in the priority queue. */
  queued: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  total: number;
};

export type WorkflowTypeInfo = {
  type: string;
  description?: string;
  steps: Array<{ id: string; type: TaskType }>;
};

export type OrchestratorOptions = {
  /** Where tasks are executed (default: HTTP executor from config). */
  gateway?: TaskExecutorGateway;
  /** Agents registered at start-up (default: the built-in three). */
  agents?: readonly AgentDescriptor[];
  /** Register the built-in workflow catalog (default true). */
  builtinWorkflows?: boolean;
  /** Audit store updated on every workflow and task change. */
  store?: WorkflowStore;
  tickIntervalMs?: number;
  heartbeatIntervalMs?: number;
  now?: () => number;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly agents = new AgentRegistry();
  readonly tasks = new TaskStore();
  readonly queue = new PriorityQueue<string>();
  readonly planner: WorkflowPlanner;
  readonly scheduler: Scheduler;
  readonly gateway: TaskExecutorGateway;

  private listeners = new Set<EventListener>();
  private readonly now: () => number;

  constructor(opts: OrchestratorOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.gateway = opts.gateway ?? new HttpTaskGateway();
    this.planner = new WorkflowPlanner({
      store: this.tasks,
      queue: this.queue,
      builtins: opts.builtinWorkflows,
      now: this.now,
    });
    this.scheduler = new Scheduler({
      store: this.tasks,
      agents: this.agents,
      queue: this.queue,
      gateway: this.gateway,
      tickIntervalMs: opts.tickIntervalMs,
      heartbeatIntervalMs: opts.heartbeatIntervalMs,
      emit: (event) => this.emit(event),
      now: this.now,
    });

    for (const descriptor of opts.agents ?? DEFAULT_AGENTS) {
      this.addAgent(descriptor);
    }
    if (opts.store) {
      this.persistTo(opts.store);
    }
  }

  // --- lifecycle ---

  start(): void {
    this.scheduler.start();
  }

  /** Stop scheduling and wait for dispatched tasks to settle. */
  async stop(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.drain();
  }

  // --- workflows ---

  createWorkflow(
    type: string,
    parameters: TaskParameters = {},
    priority: number = getConfig().workflows.defaultPriority,
  ): string {
    const { workflow, tasks } = this.planner.create(type, parameters, priority);
    this.emit({
      type: "workflow:created",
      workflow: summarizeWorkflow(workflow, tasks),
      taskIds: [...workflow.taskIds],
    });
    return workflow.id;
  }

  defineWorkflow(type: string, definition: WorkflowDefinition): void {
    this.planner.define(type, definition);
  }

  workflowTypes(): WorkflowTypeInfo[] {
    return this.planner.types().flatMap((type) => {
      const definition = this.planner.definition(type);
      if (!definition) return [];
      return [
        {
          type,
          description: definition.description,
          steps: definition.steps.map((s) => ({ id: s.id, type: s.type })),
        },
      ];
    });
  }

  getWorkflowStatus(workflowId: string): WorkflowStatusReport {
    const workflow = this.planner.require(workflowId);
    const tasks = workflow.taskIds.map((id) => this.tasks.require(id));
    return buildStatusReport(workflow, tasks, (t) => this.blockedReason(t));
  }

  listWorkflows(): WorkflowSummary[] {
    return this.planner
      .list()
      .map((w) => summarizeWorkflow(w, w.taskIds.map((id) => this.tasks.require(id))));
  }

  getTask(taskId: string): TaskSnapshot {
    const task = this.tasks.require(taskId);
    return snapshotTask(task, this.blockedReason(task));
  }

  getTaskQueueStatus(): TaskQueueStatus {
    return { queued: this.queue.size, ...this.tasks.counts() };
  }

  // --- agents ---

  addAgent(descriptor: AgentDescriptor): AgentSnapshot {
    return snapshotAgent(this.agents.add(descriptor, this.now()));
  }

  removeAgent(agentId: string): boolean {
    return this.agents.remove(agentId);
  }

  setAgentOffline(agentId: string): void {
    this.agents.setOffline(agentId);
  }

  setAgentAvailable(agentId: string): void {
    this.agents.setAvailable(agentId);
  }

  getAgentStatus(): AgentStatusReport {
    return { agents: this.agents.snapshot(), counts: this.agents.counts() };
  }

  // --- events ---

  /** Subscribe to workflow and task changes. Returns an unsubscribe function. */
  onEvent(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Why a pending task cannot run: a failed or fieldless upstream, or no
   * registered agent with its capability. Null when it can still run.
   */
  blockedReason(task: Task): BlockedReason | null {
    if (task.status !== "pending") return null;
    const state = readiness(task, (id) => this.tasks.get(id));
    if (state.state === "blocked") return state.reason;
    if (this.agents.withCapability(task.type).length === 0) return "no_capable_agent";
    return null;
  }

  private emit(event: OrchestratorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.error("Event listener failed", { event: event.type, error: errorMessage(err) });
      }
    }
  }

  private persistTo(store: WorkflowStore): void {
    this.onEvent((event) => {
      if (event.type === "workflow:created") {
        const workflow = this.planner.require(event.workflow.workflowId);
        store.saveWorkflow({
          workflowId: workflow.id,
          workflowType: workflow.type,
          priority: workflow.priority,
          parameters: workflow.parameters,
          taskIds: [...workflow.taskIds],
          createdAt: workflow.createdAt,
        });
        for (const id of workflow.taskIds) store.saveTask(this.getTask(id));
        return;
      }
      const taskId = event.type === "task:resolved" || event.type === "task:blocked" ? event.taskId : event.task.id;
      store.saveTask(this.getTask(taskId));
    });
  }
}
