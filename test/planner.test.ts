import { describe, expect, it } from "vitest";
import { UnknownWorkflowTypeError, WorkflowNotFoundError } from "../src/errors.js";
import { PriorityQueue } from "../src/executor/priority-queue.js";
import { TaskStore } from "../src/executor/task-store.js";
import { WorkflowPlanner } from "../src/planner/planner.js";
import { catchError } from "./helpers.js";

function setup(builtins?: boolean) {
  const store = new TaskStore();
  const queue = new PriorityQueue<string>();
  const planner = new WorkflowPlanner({ store, queue, builtins, now: () => 1234 });
  return { store, queue, planner };
}

describe("WorkflowPlanner", () => {
  it("starts with the built-in workflow types", () => {
    const { planner } = setup();
    expect(planner.types()).toEqual([
      "create_pr",
      "pr_with_report",
      "create_branch",
      "branch_and_pr",
      "full_branch_workflow",
    ]);
    expect(setup(false).planner.types()).toEqual([]);
  });

  it("creates a workflow, stores its tasks and queues them", () => {
    const { planner, store, queue } = setup();
    const { workflow, tasks } = planner.create("branch_and_pr", { branch: "feat" }, 3);

    expect(workflow.id).toMatch(/^workflow_[0-9a-f]{8}$/);
    expect(workflow).toMatchObject({
      type: "branch_and_pr",
      priority: 3,
      parameters: { branch: "feat" },
      createdAt: 1234,
      taskIds: [`${workflow.id}_create_branch`, `${workflow.id}_create_pr`],
    });
    expect(tasks.map((t) => store.require(t.id).priority)).toEqual([3, 4]);
    expect(queue.toArray()).toEqual([`${workflow.id}_create_branch`, `${workflow.id}_create_pr`]);
    expect(planner.require(workflow.id)).toBe(workflow);
  });

  it("rejects unknown types without creating anything", () => {
    const { planner, store, queue } = setup();

    const err = catchError(() => planner.create("deploy", {}, 2));
    expect(err).toBeInstanceOf(UnknownWorkflowTypeError);
    expect(err).toMatchObject({
      code: "UNKNOWN_WORKFLOW_TYPE",
      message:
        'Unknown workflow type "deploy" (known: create_pr, pr_with_report, create_branch, branch_and_pr, full_branch_workflow)',
    });
    expect(store.list()).toEqual([]);
    expect(queue.size).toBe(0);
    expect(planner.list()).toEqual([]);
  });

  it("rejects a non-integer priority", () => {
    const { planner, store } = setup();
    expect(catchError(() => planner.create("create_pr", {}, 1.5))).toMatchObject({
      code: "VALIDATION_FAILED",
      message: "Priority must be an integer, got 1.5",
    });
    expect(store.list()).toEqual([]);
  });

  it("accepts custom definitions but not redefinitions", () => {
    const { planner } = setup();
    planner.define("merge_then_list", {
      steps: [
        { id: "merge", type: "merge_pr" },
        { id: "list", type: "list_prs", after: ["merge"] },
      ],
    });

    expect(planner.has("merge_then_list")).toBe(true);
    const { tasks } = planner.create("merge_then_list", {}, 1);
    expect(tasks.map((t) => t.type)).toEqual(["merge_pr", "list_prs"]);

    expect(catchError(() => planner.define("create_pr", { steps: [{ id: "x", type: "create_pr" }] }))).toMatchObject({
      code: "DUPLICATE_REGISTRATION",
    });
  });

  it("does not register an invalid definition", () => {
    const { planner } = setup();
    expect(() => planner.define("broken", { steps: [] })).toThrow('Workflow "broken" has no steps');
    expect(planner.has("broken")).toBe(false);
  });

  it("keeps workflow history in creation order", () => {
    const { planner } = setup();
    const a = planner.create("create_pr", {}, 2).workflow;
    const b = planner.create("create_branch", {}, 2).workflow;

    expect(planner.list().map((w) => w.id)).toEqual([a.id, b.id]);
    expect(a.id).not.toBe(b.id);
    expect(planner.get("workflow_00000000")).toBeUndefined();
    expect(() => planner.require("workflow_00000000")).toThrow(WorkflowNotFoundError);
  });
});
