import { describe, expect, it } from "vitest";
import { DependencyResolver } from "../src/executor/dependency-resolver.js";
import { TaskStore } from "../src/executor/task-store.js";
import { BUILTIN_WORKFLOWS } from "../src/planner/catalog.js";
import { expandWorkflow } from "../src/planner/task-graph.js";

function setup() {
  const store = new TaskStore();
  for (const task of expandWorkflow("wf", BUILTIN_WORKFLOWS.pr_with_report, { title: "T" }, 2)) {
    store.add(task);
  }
  const resolver = new DependencyResolver(store);
  const finish = (result: unknown) => {
    store.markRunning("wf_create_pr", "pr_agent");
    return store.complete("wf_create_pr", result);
  };
  return { store, resolver, finish };
}

describe("DependencyResolver", () => {
  it("writes the bound field into the dependent's parameters", () => {
    const { store, resolver, finish } = setup();
    const resolved = resolver.resolve(finish({ pr_id: 42, url: "https://example.test/pr/42" }));

    expect(resolved).toEqual([{ taskId: "wf_generate_report", param: "pr_number", value: 42 }]);
    const report = store.require("wf_generate_report");
    expect(report.parameters).toEqual({ pr_number: 42 });
    expect(report.bindings[0]).toMatchObject({ resolved: true, value: 42 });
  });

  it("falls back to the next field when the first is absent or null", () => {
    const { store, resolver, finish } = setup();
    resolver.resolve(finish({ pr_id: null, pr_number: 17 }));
    expect(store.require("wf_generate_report").parameters).toEqual({ pr_number: 17 });
  });

  it("is idempotent", () => {
    const { store, resolver, finish } = setup();
    const completed = finish({ pr_id: 8 });

    resolver.resolve(completed);
    const once = { ...store.require("wf_generate_report").parameters };
    expect(resolver.resolve(completed)).toEqual([]);
    expect(store.require("wf_generate_report").parameters).toEqual(once);
  });

  it("leaves the binding unresolved when no field is present", () => {
    const { store, resolver, finish } = setup();
    expect(resolver.resolve(finish({ title: "no number" }))).toEqual([]);

    const report = store.require("wf_generate_report");
    expect(report.parameters).toEqual({});
    expect(report.bindings[0].resolved).toBe(false);
  });

  it("ignores non-object results", () => {
    const { resolver, finish } = setup();
    expect(resolver.resolve(finish([42]))).toEqual([]);
  });

  it("does nothing for a task that has not completed", () => {
    const { store, resolver } = setup();
    expect(resolver.resolve(store.require("wf_create_pr"))).toEqual([]);
  });
});
