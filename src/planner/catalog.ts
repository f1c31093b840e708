import type { WorkflowDefinition } from "./types.js";

/** Result fields that carry a pull-request number, most specific first. */
const PR_NUMBER_FIELDS = ["pr_id", "pr_number"] as const;

export const BUILTIN_WORKFLOWS = {
  create_pr: {
    description: "Open a pull request",
    steps: [{ id: "create_pr", type: "create_pr" }],
  },
  pr_with_report: {
    description: "Open a pull request, then report on it",
    steps: [
      { id: "create_pr", type: "create_pr" },
      {
        id: "generate_report",
        type: "generate_report",
        inheritParameters: false,
        after: ["create_pr"],
        bindings: [{ param: "pr_number", from: "create_pr", fields: PR_NUMBER_FIELDS }],
      },
    ],
  },
  create_branch: {
    description: "Create a branch and push it",
    steps: [
      { id: "create_branch", type: "create_branch" },
      { id: "push_branch", type: "push_branch", after: ["create_branch"] },
    ],
  },
  branch_and_pr: {
    description: "Create a branch, then open a pull request from it",
    steps: [
      { id: "create_branch", type: "create_branch" },
      { id: "create_pr", type: "create_pr", after: ["create_branch"] },
    ],
  },
  full_branch_workflow: {
    description: "Create and push a branch, open a pull request, then report on it",
    steps: [
      { id: "create_branch", type: "create_branch" },
      { id: "push_branch", type: "push_branch", after: ["create_branch"] },
      { id: "create_pr", type: "create_pr", after: ["push_branch"] },
      {
        id: "generate_report",
        type: "generate_report",
        inheritParameters: false,
        after: ["create_pr"],
        bindings: [{ param: "pr_number", from: "create_pr", fields: PR_NUMBER_FIELDS }],
      },
    ],
  },
} as const satisfies Record<string, WorkflowDefinition>;

export type BuiltinWorkflowType = keyof typeof BUILTIN_WORKFLOWS;
