import { describe, expect, it } from "vitest";
import { BUILTIN_WORKFLOWS } from "../src/planner/catalog.js";
import { expandWorkflow, readiness, taskIdFor, validateDefinition } from "../src/planner/task-graph.js";
import type { Task, WorkflowDefinition } from "../src/planner/types.js";
import { catchError } from "./helpers.js";

function lookupOf(tasks: Task[]): (id: string) => Task | undefined {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  return (id) => byId.get(id);
}

describe("validateDefinition", () => {
  it("accepts every built-in workflow", () => {
    for (const [type, def] of Object.entries(BUILTIN_WORKFLOWS)) {
      expect(() => validateDefinition(type, def)).not.toThrow();
    }
  });

  it.each<[string, WorkflowDefinition, string]>([
    ["no steps", { steps: [] }, 'Workflow "w" has no steps'],
    [
      "repeated step id",
      { steps: [{ id: "a", type: "create_pr" }, { id: "a", type: "merge_pr" }] },
      'Workflow "w" repeats step "a"',
    ],
    [
      "forward reference",
      { steps: [{ id: "a", type: "create_pr", after: ["b"] }, { id: "b", type: "merge_pr" }] },
      'Step "a" runs after "b", which is not an earlier step',
    ],
    ["self reference", { steps: [{ id: "a", type: "create_pr", after: ["a"] }] }, 'Step "a" runs after itself'],
    [
      "binding without fields",
      {
        steps: [
          { id: "a", type: "create_pr" },
          { id: "b", type: "generate_report", bindings: [{ param: "n", from: "a", fields: [] }] },
        ],
      },
      'Step "b" binding "n" names no result fields',
    ],
  ])("rejects %s", (_name, def, message) => {
    expect(catchError(() => validateDefinition("w", def))).toMatchObject({ code: "INVALID_DEFINITION", message });
  });

  it("rejects an empty type name", () => {
    expect(() => validateDefinition("  ", { steps: [{ id: "a", type: "create_pr" }] })).toThrow(
      "Workflow type must not be empty",
    );
  });
});

describe("expandWorkflow", () => {
  it("creates one pending task per step with increasing priority", () => {
    const params = { repo: "demo", branch: "feature/x" };
    const tasks = expandWorkflow("wf1", BUILTIN_WORKFLOWS.full_branch_workflow, params, 2, 500);

    expect(tasks.map((t) => [t.id, t.type, t.priority])).toEqual([
      ["wf1_create_branch", "create_branch", 2],
      ["wf1_push_branch", "push_branch", 3],
      ["wf1_create_pr", "create_pr", 4],
      ["wf1_generate_report", "generate_report", 5],
    ]);
    expect(tasks.every((t) => t.status === "pending" && t.createdAt === 500 && t.workflowId === "wf1")).toBe(true);
    expect(tasks[1].dependsOn).toEqual(["wf1_create_branch"]);
  });

  it("copies parameters per task and leaves non-inheriting steps empty", () => {
    const params = { title: "Fix" };
    const tasks = expandWorkflow("wf1", BUILTIN_WORKFLOWS.pr_with_report, params, 1);

    expect(tasks[0].parameters).toEqual({ title: "Fix" });
    expect(tasks[0].parameters).not.toBe(params);
    expect(tasks[1].parameters).toEqual({});
    expect(tasks[1].bindings).toEqual([
      { param: "pr_number", sourceTaskId: "wf1_create_pr", fields: ["pr_id", "pr_number"], resolved: false },
    ]);
    expect(tasks[1].dependsOn).toEqual(["wf1_create_pr"]);
  });

  it("builds ids from workflow and step", () => {
    expect(taskIdFor("workflow_ab12cd34", "create_pr")).toBe("workflow_ab12cd34_create_pr");
  });
});

describe("readiness", () => {
  it("is ready without dependencies and waiting until they complete", () => {
    const tasks = expandWorkflow("wf", BUILTIN_WORKFLOWS.create_branch, {}, 1);
    const lookup = lookupOf(tasks);

    expect(readiness(tasks[0], lookup)).toEqual({ state: "ready" });
    expect(readiness(tasks[1], lookup)).toEqual({ state: "waiting" });

    tasks[0].status = "running";
    expect(readiness(tasks[1], lookup)).toEqual({ state: "waiting" });

    tasks[0].status = "completed";
    expect(readiness(tasks[1], lookup)).toEqual({ state: "ready" });
  });

  it("blocks dependents of a failed task, transitively", () => {
    const tasks = expandWorkflow("wf", BUILTIN_WORKFLOWS.full_branch_workflow, {}, 1);
    const lookup = lookupOf(tasks);
    tasks[0].status = "failed";

    for (const task of tasks.slice(1)) {
      expect(readiness(task, lookup)).toEqual({ state: "blocked", reason: "upstream_failed" });
    }
  });

  it("treats a missing dependency as failed", () => {
    const [, report] = expandWorkflow("wf", BUILTIN_WORKFLOWS.pr_with_report, {}, 1);
    expect(readiness(report, () => undefined)).toEqual({ state: "blocked", reason: "upstream_failed" });
  });

  it("blocks a task whose source completed without the bound field", () => {
    const tasks = expandWorkflow("wf", BUILTIN_WORKFLOWS.pr_with_report, {}, 1);
    tasks[0].status = "completed";
    expect(readiness(tasks[1], lookupOf(tasks))).toEqual({ state: "blocked", reason: "missing_field" });

    tasks[1].bindings[0].resolved = true;
    expect(readiness(tasks[1], lookupOf(tasks))).toEqual({ state: "ready" });
  });
});
