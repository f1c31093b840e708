import type { TaskType } from "../planner/types.js";

/** Remote operation invoked for each task type. */
export const OPERATIONS: Readonly<Record<TaskType, string>> = {
  create_pr: "create_pull_request",
  merge_pr: "merge_pull_request",
  list_prs: "list_pull_requests",
  generate_report: "generate_report",
  create_local_url: "create_local_url",
  save_report: "save_report",
  create_branch: "create_branch",
  create_branch_from_base: "create_branch_from_base",
  checkout_branch: "checkout_branch",
  push_branch: "push_branch",
  delete_branch: "delete_branch",
  list_branches: "list_branches",
};

export function operationFor(type: TaskType): string {
  return OPERATIONS[type];
}
