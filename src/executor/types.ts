import type { BlockedReason, TaskSnapshot, WorkflowSummary } from "../planner/types.js";

export type TickReport = {
  dispatched: string[];
  /** Ready or waiting tasks put back on the queue for a later tick. */
  deferred: string[];
  /** Entries removed from the queue: already claimed, or blocked for good. */
  dropped: string[];
};

export type OrchestratorEvent =
  | { type: "workflow:created"; workflow: WorkflowSummary; taskIds: string[] }
  | { type: "task:started"; task: TaskSnapshot }
  | { type: "task:completed"; task: TaskSnapshot }
  | { type: "task:failed"; task: TaskSnapshot }
  | { type: "task:resolved"; taskId: string; param: string; sourceTaskId: string }
  | { type: "task:blocked"; taskId: string; reason: BlockedReason };

export type EventListener = (event: OrchestratorEvent) => void;
