import type { ErrorCode } from "../errors.js";
import type { OrchestratorEvent } from "../executor/types.js";
import type { AgentCounts } from "../agents/types.js";
import type { TaskQueueStatus } from "../orchestrator.js";

// --- REST Request/Response ---

export type CreateWorkflowResponse = {
  workflowId: string;
};

export type HealthResponse = {
  ok: true;
  scheduler: { running: boolean; inflight: number };
  agents: AgentCounts;
  queue: TaskQueueStatus;
};

export type ExecutorHealthResponse = {
  gateway: string;
  /** null when the gateway has no health probe. */
  healthy: boolean | null;
};

export type ApiErrorCode = ErrorCode | "NOT_FOUND" | "INVALID_JSON" | "INTERNAL";

export type ApiError = {
  error: string;
  code: ApiErrorCode;
};

// --- SSE ---

/** Every orchestrator event is forwarded to event-stream clients as-is. */
export type SSEEvent = OrchestratorEvent;
