import { ValidationError } from "../errors.js";
import type {
  BlockedReason,
  DependencyBinding,
  Task,
  TaskParameters,
  WorkflowDefinition,
} from "./types.js";

export type Readiness =
  | { state: "ready" }
  | { state: "waiting" }
  | { state: "blocked"; reason: Exclude<BlockedReason, "no_capable_agent"> };

type TaskLookup = (id: string) => Task | undefined;

/**
 * Validate a workflow definition: at least one step, unique step ids, and
 * every `after`/binding source naming an earlier step. Referring only
 * backwards keeps the expanded graph acyclic.
 */
export function validateDefinition(type: string, definition: WorkflowDefinition): void {
  if (!type.trim()) {
    throw new ValidationError("INVALID_DEFINITION", "Workflow type must not be empty");
  }
  if (definition.steps.length === 0) {
    throw new ValidationError("INVALID_DEFINITION", `Workflow "${type}" has no steps`);
  }

  const seen = new Set<string>();
  for (const step of definition.steps) {
    if (seen.has(step.id)) {
      throw new ValidationError("INVALID_DEFINITION", `Workflow "${type}" repeats step "${step.id}"`);
    }
    const earlier = (ref: string, what: string): void => {
      if (ref === step.id) {
        throw new ValidationError("INVALID_DEFINITION", `Step "${step.id}" ${what} itself`);
      }
      if (!seen.has(ref)) {
        throw new ValidationError(
          "INVALID_DEFINITION",
          `Step "${step.id}" ${what} "${ref}", which is not an earlier step`,
        );
      }
    };
    for (const ref of step.after ?? []) earlier(ref, "runs after");
    for (const binding of step.bindings ?? []) {
      earlier(binding.from, "binds from");
      if (binding.fields.length === 0) {
        throw new ValidationError(
          "INVALID_DEFINITION",
          `Step "${step.id}" binding "${binding.param}" names no result fields`,
        );
      }
    }
    seen.add(step.id);
  }
}

export function taskIdFor(workflowId: string, stepId: string): string {
  return `${workflowId}_${stepId}`;
}

/** Turn a definition into pending tasks. Priority grows by one per step. */
export function expandWorkflow(
  workflowId: string,
  definition: WorkflowDefinition,
  parameters: TaskParameters,
  basePriority: number,
  now = Date.now(),
): Task[] {
  return definition.steps.map((step, index) => {
    const bindings: DependencyBinding[] = (step.bindings ?? []).map((b) => ({
      param: b.param,
      sourceTaskId: taskIdFor(workflowId, b.from),
      fields: [...b.fields],
      resolved: false,
    }));
    const dependsOn = new Set<string>((step.after ?? []).map((ref) => taskIdFor(workflowId, ref)));
    for (const b of bindings) dependsOn.add(b.sourceTaskId);

    return {
      id: taskIdFor(workflowId, step.id),
      workflowId,
      stepId: step.id,
      type: step.type,
      priority: basePriority + index,
      parameters: step.inheritParameters === false ? {} : { ...parameters },
      dependsOn: [...dependsOn],
      bindings,
      status: "pending",
      assignedAgent: null,
      createdAt: now,
      startedAt: null,
      completedAt: null,
      result: null,
      error: null,
      dispatchAttempts: 0,
    };
  });
}

/**
 * Whether a pending task's upstream work allows it to run. A task is blocked
 * for good when something it depends on failed (directly or further up), or
 * when its source completed without any of the bound fields.
 */
export function readiness(task: Task, lookup: TaskLookup): Readiness {
  let waiting = false;

  for (const depId of task.dependsOn) {
    const dep = lookup(depId);
    if (!dep || dep.status === "failed") {
      return { state: "blocked", reason: "upstream_failed" };
    }
    if (dep.status === "pending" && readiness(dep, lookup).state === "blocked") {
      return { state: "blocked", reason: "upstream_failed" };
    }
    if (dep.status !== "completed") waiting = true;
  }
  if (waiting) return { state: "waiting" };

  if (task.bindings.some((b) => !b.resolved)) {
    return { state: "blocked", reason: "missing_field" };
  }
  return { state: "ready" };
}
