export type ErrorCode =
  | "UNKNOWN_WORKFLOW_TYPE"
  | "WORKFLOW_NOT_FOUND"
  | "TASK_NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "AGENT_BUSY"
  | "DUPLICATE_REGISTRATION"
  | "INVALID_DEFINITION"
  | "INVALID_TRANSITION"
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID";

/** Base class for every error the orchestrator raises on purpose. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends OrchestratorError {
  constructor(
    code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION" | "INVALID_DEFINITION" | "AGENT_BUSY",
    message: string,
  ) {
    super(code, message);
  }
}

export class UnknownWorkflowTypeError extends OrchestratorError {
  readonly workflowType: string;

  constructor(workflowType: string, known: readonly string[]) {
    super(
      "UNKNOWN_WORKFLOW_TYPE",
      `Unknown workflow type "${workflowType}" (known: ${known.join(", ") || "none"})`,
    );
    this.workflowType = workflowType;
  }
}

export class WorkflowNotFoundError extends OrchestratorError {
  constructor(workflowId: string) {
    super("WORKFLOW_NOT_FOUND", `Workflow "${workflowId}" not found`);
  }
}

export class TaskNotFoundError extends OrchestratorError {
  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task "${taskId}" not found`);
  }
}

export class AgentNotFoundError extends OrchestratorError {
  constructor(agentId: string) {
    super("AGENT_NOT_FOUND", `Agent "${agentId}" not registered`);
  }
}

export class InvalidTransitionError extends OrchestratorError {
  constructor(taskId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Task "${taskId}" cannot move from ${from} to ${to}`);
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
