export type ExecutionRequest = {
  taskId: string;
  /** Operation name the remote executor understands. */
  operation: string;
  arguments: Record<string, unknown>;
};

export type ExecutionMetadata = {
  durationMs: number;
  httpStatus?: number;
};

export type ExecutionResult =
  | { status: "ok"; result: unknown; metadata: ExecutionMetadata }
  | { status: "error" | "timeout"; error: string; metadata: ExecutionMetadata };

/**
 * The boundary to whatever actually performs a task. Implementations report
 * failure through the result; a rejected promise is treated the same way.
 */
export interface TaskExecutorGateway {
  readonly name: string;
  execute(request: ExecutionRequest): Promise<ExecutionResult>;
  healthCheck?(): Promise<boolean>;
}
