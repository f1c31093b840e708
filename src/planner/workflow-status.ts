import type {
  BlockedReason,
  Task,
  TaskSnapshot,
  Workflow,
  WorkflowStatus,
  WorkflowStatusReport,
  WorkflowSummary,
} from "./types.js";

/** failed if any task failed, completed if all completed, running otherwise. */
export function deriveStatus(tasks: ReadonlyArray<Pick<Task, "status">>): WorkflowStatus {
  if (tasks.some((t) => t.status === "failed")) return "failed";
  if (tasks.every((t) => t.status === "completed")) return "completed";
  return "running";
}

export function progressString(tasks: ReadonlyArray<Pick<Task, "status">>): string {
  const completed = tasks.filter((t) => t.status === "completed").length;
  return `${completed}/${tasks.length} tasks completed`;
}

export function snapshotTask(task: Task, blocked: BlockedReason | null = null): TaskSnapshot {
  return {
    id: task.id,
    workflowId: task.workflowId,
    stepId: task.stepId,
    type: task.type,
    priority: task.priority,
    parameters: { ...task.parameters },
    dependsOn: [...task.dependsOn],
    bindings: task.bindings.map((b) => ({
      param: b.param,
      sourceTaskId: b.sourceTaskId,
      fields: [...b.fields],
      resolved: b.resolved,
    })),
    status: task.status,
    assignedAgent: task.assignedAgent,
    createdAt: task.createdAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt,
    result: task.result,
    error: task.error,
    dispatchAttempts: task.dispatchAttempts,
    blocked,
  };
}

export function summarizeWorkflow(workflow: Workflow, tasks: readonly Task[]): WorkflowSummary {
  return {
    workflowId: workflow.id,
    workflowType: workflow.type,
    status: deriveStatus(tasks),
    progress: progressString(tasks),
    createdAt: workflow.createdAt,
  };
}

/** Build a fresh status report; nothing here is cached between calls. */
export function buildStatusReport(
  workflow: Workflow,
  tasks: readonly Task[],
  blockedReason: (task: Task) => BlockedReason | null,
): WorkflowStatusReport {
  const snapshots = tasks.map((t) => snapshotTask(t, blockedReason(t)));
  const blocked = snapshots.flatMap((s) => (s.blocked ? [{ taskId: s.id, reason: s.blocked }] : []));

  return {
    workflowId: workflow.id,
    workflowType: workflow.type,
    status: deriveStatus(tasks),
    tasks: snapshots,
    progress: progressString(tasks),
    createdAt: workflow.createdAt,
    parameters: { ...workflow.parameters },
    blocked,
  };
}
