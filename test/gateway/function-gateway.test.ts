import { describe, expect, it } from "vitest";
import { FunctionTaskGateway } from "../../src/gateway/function-gateway.js";
import { OPERATIONS, operationFor } from "../../src/gateway/operations.js";
import { TASK_TYPES } from "../../src/planner/types.js";

describe("FunctionTaskGateway", () => {
  it("passes arguments and task id to the handler", async () => {
    const seen: Array<[Record<string, unknown>, string]> = [];
    const gateway = new FunctionTaskGateway({
      handlers: {
        merge_pull_request: async (args, { taskId }) => {
          seen.push([args, taskId]);
          return { merged: true };
        },
      },
    });

    const result = await gateway.execute({ taskId: "t1", operation: "merge_pull_request", arguments: { pr_number: 4 } });

    expect(result).toMatchObject({ status: "ok", result: { merged: true } });
    expect(seen).toEqual([[{ pr_number: 4 }, "t1"]]);
  });

  it("reports an operation with no handler", async () => {
    const gateway = new FunctionTaskGateway({ handlers: {} });
    const result = await gateway.execute({ taskId: "t1", operation: "save_report", arguments: {} });
    expect(result).toEqual({
      status: "error",
      error: 'No handler for operation "save_report"',
      metadata: { durationMs: 0 },
    });
  });

  it("falls back when no specific handler exists", async () => {
    const gateway = new FunctionTaskGateway({ handlers: {}, fallback: async () => "fallback" });
    const result = await gateway.execute({ taskId: "t1", operation: "list_branches", arguments: {} });
    expect(result).toMatchObject({ status: "ok", result: "fallback" });
  });

  it("turns a thrown error into an error result", async () => {
    const gateway = new FunctionTaskGateway({
      handlers: {
        push_branch: async () => {
          throw new Error("rejected by remote");
        },
      },
    });
    const result = await gateway.execute({ taskId: "t1", operation: "push_branch", arguments: {} });
    expect(result).toMatchObject({ status: "error", error: "rejected by remote" });
  });

  it("times out a handler that never settles", async () => {
    const gateway = new FunctionTaskGateway({
      handlers: { create_branch: () => new Promise(() => {}) },
      timeout: 20,
    });
    const result = await gateway.execute({ taskId: "t1", operation: "create_branch", arguments: {} });
    expect(result).toMatchObject({ status: "timeout", error: "Timed out after 20ms" });
  });
});

describe("operationFor", () => {
  it("maps pull-request types to executor tool names", () => {
    expect(operationFor("create_pr")).toBe("create_pull_request");
    expect(operationFor("merge_pr")).toBe("merge_pull_request");
    expect(operationFor("list_prs")).toBe("list_pull_requests");
    expect(operationFor("push_branch")).toBe("push_branch");
  });

  it("covers every task type", () => {
    expect(Object.keys(OPERATIONS).sort()).toEqual([...TASK_TYPES].sort());
  });
});
