/** Every kind of task an agent can be asked to run. */
export const TASK_TYPES = [
  "create_pr",
  "merge_pr",
  "list_prs",
  "generate_report",
  "create_local_url",
  "save_report",
  "create_branch",
  "create_branch_from_base",
  "checkout_branch",
  "push_branch",
  "delete_branch",
  "list_branches",
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export function isTaskType(value: string): value is TaskType {
  return TASK_TYPES.some((t) => t === value);
}

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export type TaskParameters = Record<string, unknown>;

/**
 * A typed dependency edge: once `sourceTaskId` completes, the first of
 * `fields` present on its result is written to `param`.
 */
export type DependencyBinding = {
  param: string;
  sourceTaskId: string;
  fields: readonly string[];
  resolved: boolean;
  value?: unknown;
};

export type Task = {
  readonly id: string;
  readonly workflowId: string;
  readonly stepId: string;
  readonly type: TaskType;
  readonly priority: number;
  parameters: TaskParameters;
  /** Tasks that must be completed before this one may be dispatched. */
  readonly dependsOn: readonly string[];
  readonly bindings: DependencyBinding[];
  status: TaskStatus;
  assignedAgent: string | null;
  readonly createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  result: unknown;
  error: string | null;
  dispatchAttempts: number;
};

/** Why a pending task cannot currently be dispatched. */
export type BlockedReason = "upstream_failed" | "missing_field" | "no_capable_agent";

export type TaskSnapshot = {
  id: string;
  workflowId: string;
  stepId: string;
  type: TaskType;
  priority: number;
  parameters: TaskParameters;
  dependsOn: string[];
  bindings: Array<{ param: string; sourceTaskId: string; fields: string[]; resolved: boolean }>;
  status: TaskStatus;
  assignedAgent: string | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  result: unknown;
  error: string | null;
  dispatchAttempts: number;
  blocked: BlockedReason | null;
};

// ---------------------------------------------------------------------------
// Workflow definitions
// ---------------------------------------------------------------------------

export type BindingDefinition = {
  param: string;
  /** Step id of an earlier step. */
  from: string;
  /** Result fields to try, in order. */
  fields: readonly string[];
};

export type WorkflowStepDefinition = {
  id: string;
  type: TaskType;
  /** Copy the request parameters into this task (default true). */
  inheritParameters?: boolean;
  /** Step ids that must complete first. */
  after?: readonly string[];
  bindings?: readonly BindingDefinition[];
};

export type WorkflowDefinition = {
  description?: string;
  steps: readonly WorkflowStepDefinition[];
};

export type Workflow = {
  readonly id: string;
  readonly type: string;
  readonly taskIds: readonly string[];
  readonly priority: number;
  readonly parameters: TaskParameters;
  readonly createdAt: number;
};

export type WorkflowStatus = "running" | "completed" | "failed";

export type WorkflowStatusReport = {
  workflowId: string;
  workflowType: string;
  status: WorkflowStatus;
  tasks: TaskSnapshot[];
  progress: string;
  createdAt: number;
  parameters: TaskParameters;
  blocked: Array<{ taskId: string; reason: BlockedReason }>;
};

export type WorkflowSummary = {
  workflowId: string;
  workflowType: string;
  status: WorkflowStatus;
  progress: string;
  createdAt: number;
};
