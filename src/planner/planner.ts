import { randomUUID } from "node:crypto";
import { UnknownWorkflowTypeError, ValidationError, WorkflowNotFoundError } from "../errors.js";
import type { PriorityQueue } from "../executor/priority-queue.js";
import type { TaskStore } from "../executor/task-store.js";
import { log } from "../utils/logger.js";
import { BUILTIN_WORKFLOWS } from "./catalog.js";
import { expandWorkflow, validateDefinition } from "./task-graph.js";
import type { Task, TaskParameters, Workflow, WorkflowDefinition } from "./types.js";

const logger = log.child("planner");

export type WorkflowPlannerOptions = {
  store: TaskStore;
  queue: PriorityQueue<string>;
  /** Start with the built-in catalog (default true). */
  builtins?: boolean;
  now?: () => number;
};

export type PlannedWorkflow = {
  workflow: Workflow;
  tasks: Task[];
};

/**
 * Expands a workflow request into tasks, registers them with the task store
 * and the queue, and keeps the history of every workflow created.
 */
export class WorkflowPlanner {
  private readonly store: TaskStore;
  private readonly queue: PriorityQueue<string>;
  private readonly now: () => number;
  private definitions = new Map<string, WorkflowDefinition>();
  private history: Workflow[] = [];
  private byId = new Map<string, Workflow>();

  constructor(opts: WorkflowPlannerOptions) {
    this.store = opts.store;
    this.queue = opts.queue;
    this.now = opts.now ?? Date.now;
    if (opts.builtins !== false) {
      for (const [type, definition] of Object.entries(BUILTIN_WORKFLOWS)) {
        this.define(type, definition);
      }
    }
  }

  /** Add a workflow type. Types cannot be redefined. */
  define(type: string, definition: WorkflowDefinition): void {
    if (this.definitions.has(type)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Workflow type "${type}" already defined`);
    }
    validateDefinition(type, definition);
    this.definitions.set(type, definition);
  }

  has(type: string): boolean {
    return this.definitions.has(type);
  }

  types(): string[] {
    return [...this.definitions.keys()];
  }

  definition(type: string): WorkflowDefinition | undefined {
    return this.definitions.get(type);
  }

  /**
   * Everything is validated before the first task is stored, so a rejected
   * request leaves no tasks and no workflow behind.
   */
  create(type: string, parameters: TaskParameters, priority: number): PlannedWorkflow {
    const definition = this.definitions.get(type);
    if (!definition) {
      throw new UnknownWorkflowTypeError(type, this.types());
    }
    if (!Number.isInteger(priority)) {
      throw new ValidationError("VALIDATION_FAILED", `Priority must be an integer, got ${priority}`);
    }

    const now = this.now();
    const id = this.newId();
    const tasks = expandWorkflow(id, definition, parameters, priority, now);
    for (const task of tasks) {
      this.store.add(task);
      this.queue.push(task.id, task.priority);
    }

    const workflow: Workflow = {
      id,
      type,
      taskIds: tasks.map((t) => t.id),
      priority,
      parameters: { ...parameters },
      createdAt: now,
    };
    this.history.push(workflow);
    this.byId.set(id, workflow);

    logger.info(`Created workflow ${id}: ${type}`, { tasks: tasks.length, priority });
    return { workflow, tasks };
  }

  get(id: string): Workflow | undefined {
    return this.byId.get(id);
  }

  require(id: string): Workflow {
    const workflow = this.byId.get(id);
    if (!workflow) throw new WorkflowNotFoundError(id);
    return workflow;
  }

  /** Workflows in creation order. */
  list(): Workflow[] {
    return [...this.history];
  }

  private newId(): string {
    let id: string;
    do {
      id = `workflow_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
    } while (this.byId.has(id));
    return id;
  }
}
