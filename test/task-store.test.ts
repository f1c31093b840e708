import { describe, expect, it } from "vitest";
import { InvalidTransitionError, TaskNotFoundError } from "../src/errors.js";
import { TaskStore } from "../src/executor/task-store.js";
import { BUILTIN_WORKFLOWS } from "../src/planner/catalog.js";
import { expandWorkflow } from "../src/planner/task-graph.js";
import { catchError } from "./helpers.js";

function storeWithReportWorkflow(): TaskStore {
  const store = new TaskStore();
  for (const task of expandWorkflow("wf", BUILTIN_WORKFLOWS.pr_with_report, { title: "T" }, 2, 100)) {
    store.add(task);
  }
  return store;
}

describe("TaskStore", () => {
  it("moves a task pending → running → completed", () => {
    const store = storeWithReportWorkflow();

    store.markRunning("wf_create_pr", "pr_agent", 200);
    expect(store.require("wf_create_pr")).toMatchObject({
      status: "running",
      assignedAgent: "pr_agent",
      startedAt: 200,
      completedAt: null,
    });

    store.complete("wf_create_pr", { pr_id: 1 }, 300);
    expect(store.require("wf_create_pr")).toMatchObject({
      status: "completed",
      result: { pr_id: 1 },
      completedAt: 300,
      error: null,
    });
  });

  it("records the error of a failed task", () => {
    const store = storeWithReportWorkflow();
    store.markRunning("wf_create_pr", "pr_agent");
    store.fail("wf_create_pr", "HTTP 502: bad gateway", 400);

    expect(store.require("wf_create_pr")).toMatchObject({
      status: "failed",
      error: "HTTP 502: bad gateway",
      result: null,
      completedAt: 400,
    });
  });

  it("rejects transitions that skip or reverse a state", () => {
    const store = storeWithReportWorkflow();

    const err = catchError(() => store.complete("wf_create_pr", {}));
    expect(err).toBeInstanceOf(InvalidTransitionError);
    expect(err).toMatchObject({
      code: "INVALID_TRANSITION",
      message: 'Task "wf_create_pr" cannot move from pending to completed',
    });

    store.markRunning("wf_create_pr", "pr_agent");
    store.complete("wf_create_pr", {});
    expect(() => store.markRunning("wf_create_pr", "pr_agent")).toThrow(InvalidTransitionError);
    expect(() => store.fail("wf_create_pr", "late")).toThrow(InvalidTransitionError);
    expect(store.require("wf_create_pr").status).toBe("completed");
  });

  it("rejects duplicate ids", () => {
    const store = storeWithReportWorkflow();
    const [first] = expandWorkflow("wf", BUILTIN_WORKFLOWS.create_pr, {}, 1);

    expect(catchError(() => store.add(first))).toMatchObject({ code: "DUPLICATE_REGISTRATION" });
  });

  it("throws TaskNotFoundError for unknown ids", () => {
    const store = new TaskStore();
    expect(store.get("missing")).toBeUndefined();
    expect(() => store.require("missing")).toThrow(TaskNotFoundError);
    expect(() => store.require("missing")).toThrow('Task "missing" not found');
  });

  it("counts tasks by status", () => {
    const store = storeWithReportWorkflow();
    store.markRunning("wf_create_pr", "pr_agent");

    expect(store.counts()).toEqual({ pending: 1, running: 1, completed: 0, failed: 0, total: 2 });
    expect(store.withStatus("pending").map((t) => t.id)).toEqual(["wf_generate_report"]);
  });
});
