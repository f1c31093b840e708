import type { Task } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { TaskStore } from "./task-store.js";

const logger = log.child("resolver");

export type ResolvedBinding = {
  taskId: string;
  param: string;
  value: unknown;
};

function readField(result: unknown, fields: readonly string[]): unknown {
  if (typeof result !== "object" || result === null || Array.isArray(result)) return undefined;
  for (const field of fields) {
    const value: unknown = Reflect.get(result, field);
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

/**
 * Fills parameters of pending tasks from the result of a task that just
 * completed. A binding is written at most once; running the resolver again
 * for the same task changes nothing.
 */
export class DependencyResolver {
  constructor(private readonly store: TaskStore) {}

  resolve(completed: Task): ResolvedBinding[] {
    if (completed.status !== "completed") return [];

    const resolved: ResolvedBinding[] = [];
    for (const task of this.store.withStatus("pending")) {
      for (const binding of task.bindings) {
        if (binding.resolved || binding.sourceTaskId !== completed.id) continue;

        const value = readField(completed.result, binding.fields);
        if (value === undefined) {
          logger.warn(`Result of "${completed.id}" has none of the fields "${task.id}" needs`, {
            param: binding.param,
            fields: binding.fields,
          });
          continue;
        }
        task.parameters[binding.param] = value;
        binding.resolved = true;
        binding.value = value;
        resolved.push({ taskId: task.id, param: binding.param, value });
        logger.info(`Resolved "${binding.param}" for "${task.id}" from "${completed.id}"`);
      }
    }
    return resolved;
  }
}
