import { InvalidTransitionError, TaskNotFoundError, ValidationError } from "../errors.js";
import type { Task, TaskStatus } from "../planner/types.js";

const ALLOWED: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export type QueueCounts = {
  pending: number;
  running: number;
  completed: number;
  failed: number;
  total: number;
};

/**
 * Every task ever created, by id. Status only moves forward through
 * `markRunning`, `complete` and `fail`; tasks are never removed.
 */
export class TaskStore {
  private tasks = new Map<string, Task>();

  add(task: Task): void {
    if (this.tasks.has(task.id)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Task "${task.id}" already exists`);
    }
    this.tasks.set(task.id, task);
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  require(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  list(): Task[] {
    return [...this.tasks.values()];
  }

  withStatus(status: TaskStatus): Task[] {
    return this.list().filter((t) => t.status === status);
  }

  markRunning(id: string, agentId: string, now = Date.now()): Task {
    const task = this.transition(id, "running");
    task.assignedAgent = agentId;
    task.startedAt = now;
    return task;
  }

  complete(id: string, result: unknown, now = Date.now()): Task {
    const task = this.transition(id, "completed");
    task.result = result;
    task.completedAt = now;
    return task;
  }

  fail(id: string, error: string, now = Date.now()): Task {
    const task = this.transition(id, "failed");
    task.error = error;
    task.completedAt = now;
    return task;
  }

  counts(): QueueCounts {
    const counts: QueueCounts = { pending: 0, running: 0, completed: 0, failed: 0, total: 0 };
    for (const task of this.tasks.values()) {
      counts[task.status]++;
      counts.total++;
    }
    return counts;
  }

  private transition(id: string, to: TaskStatus): Task {
    const task = this.require(id);
    if (!ALLOWED[task.status].includes(to)) {
      throw new InvalidTransitionError(id, task.status, to);
    }
    task.status = to;
    return task;
  }
}
