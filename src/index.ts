// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { OrchestratorConfig, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  UnknownWorkflowTypeError,
  WorkflowNotFoundError,
  TaskNotFoundError,
  AgentNotFoundError,
  InvalidTransitionError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  CreateWorkflowRequestSchema,
  AgentDescriptorSchema,
  AgentFileSchema,
  ExecutorResponseSchema,
} from "./schemas.js";
export type { CreateWorkflowRequest, ExecutorResponse } from "./schemas.js";

// Persistence
export { WorkflowStore } from "./persistence/store.js";
export type { StoredWorkflow, StoredTask } from "./persistence/store.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, AgentStatusReport, TaskQueueStatus, WorkflowTypeInfo } from "./orchestrator.js";

// Agents
export { AgentRegistry, snapshotAgent } from "./agents/registry.js";
export { DEFAULT_AGENTS, loadAgentFile } from "./agents/defaults.js";
export type { Agent, AgentCounts, AgentDescriptor, AgentSnapshot, AgentStatus } from "./agents/types.js";

// Planner
export { WorkflowPlanner } from "./planner/planner.js";
export type { PlannedWorkflow, WorkflowPlannerOptions } from "./planner/planner.js";
export { BUILTIN_WORKFLOWS } from "./planner/catalog.js";
export type { BuiltinWorkflowType } from "./planner/catalog.js";
export { expandWorkflow, readiness, taskIdFor, validateDefinition } from "./planner/task-graph.js";
export type { Readiness } from "./planner/task-graph.js";
export { buildStatusReport, deriveStatus, progressString } from "./planner/workflow-status.js";
export { TASK_TYPES, isTaskType } from "./planner/types.js";
export type {
  BindingDefinition,
  BlockedReason,
  DependencyBinding,
  Task,
  TaskParameters,
  TaskSnapshot,
  TaskStatus,
  TaskType,
  Workflow,
  WorkflowDefinition,
  WorkflowStatus,
  WorkflowStatusReport,
  WorkflowStepDefinition,
  WorkflowSummary,
} from "./planner/types.js";

// Executor
export { Scheduler } from "./executor/scheduler.js";
export type { SchedulerOptions } from "./executor/scheduler.js";
export { TaskStore } from "./executor/task-store.js";
export type { QueueCounts } from "./executor/task-store.js";
export { PriorityQueue } from "./executor/priority-queue.js";
export { DependencyResolver } from "./executor/dependency-resolver.js";
export type { ResolvedBinding } from "./executor/dependency-resolver.js";
export type { EventListener, OrchestratorEvent, TickReport } from "./executor/types.js";

// Gateway
export { HttpTaskGateway } from "./gateway/http-gateway.js";
export type { HttpTaskGatewayOptions } from "./gateway/http-gateway.js";
export { FunctionTaskGateway } from "./gateway/function-gateway.js";
export type { FunctionTaskGatewayOptions, OperationHandler } from "./gateway/function-gateway.js";
export { OPERATIONS, operationFor } from "./gateway/operations.js";
export type { ExecutionRequest, ExecutionResult, TaskExecutorGateway } from "./gateway/types.js";

// API
export { ApiServer } from "./api/server.js";
export type { ApiServerOptions } from "./api/server.js";
export type { ApiError, CreateWorkflowResponse, HealthResponse, SSEEvent } from "./api/types.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
