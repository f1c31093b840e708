import { describe, expect, it } from "vitest";
import { AgentFileSchema, CreateWorkflowRequestSchema, parseOrThrow } from "../src/schemas.js";
import { catchError } from "./helpers.js";

describe("schemas", () => {
  it("names every invalid field", () => {
    const err = catchError(() =>
      parseOrThrow(CreateWorkflowRequestSchema, { type: " ", priority: 1.5 }, "workflow request"),
    );
    expect(err).toMatchObject({
      code: "VALIDATION_FAILED",
      message: "Invalid workflow request: type: type must not be empty; priority: priority must be an integer",
    });
  });

  it("trims the workflow type", () => {
    expect(parseOrThrow(CreateWorkflowRequestSchema, { type: " create_pr " }, "req")).toEqual({ type: "create_pr" });
  });

  it("only accepts known capabilities in agent files", () => {
    const result = AgentFileSchema.safeParse({
      agents: [{ id: "x", name: "X", capabilities: ["deploy"] }],
    });
    expect(result.success).toBe(false);
  });
});
