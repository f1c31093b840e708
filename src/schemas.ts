import { z } from "zod";
import { ValidationError } from "./errors.js";
import { TASK_TYPES } from "./planner/types.js";

export const TaskParametersSchema = z.record(z.unknown());

export const CreateWorkflowRequestSchema = z.object({
  type: z
    .string({ required_error: "type is required", invalid_type_error: "type must be a string" })
    .trim()
    .min(1, "type must not be empty"),
  parameters: TaskParametersSchema.optional(),
  priority: z.number({ invalid_type_error: "priority must be a number" }).int("priority must be an integer").optional(),
});

export type CreateWorkflowRequest = z.infer<typeof CreateWorkflowRequestSchema>;

export const AgentDescriptorSchema = z.object({
  id: z.string().trim().min(1, "agent id must not be empty"),
  name: z.string().trim().min(1, "agent name must not be empty"),
  capabilities: z.array(z.enum(TASK_TYPES)).min(1, "agent needs at least one capability"),
  performanceScore: z.number().finite().optional(),
  offline: z.boolean().optional(),
});

export const AgentFileSchema = z.object({
  agents: z.array(AgentDescriptorSchema).min(1, "agent file lists no agents"),
});

/** Body the remote executor answers `/call` with. */
export const ExecutorResponseSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export type ExecutorResponse = z.infer<typeof ExecutorResponseSchema>;

/** The part of a workflow status report the CLI prints. */
export const WorkflowStatusViewSchema = z.object({
  workflowId: z.string(),
  workflowType: z.string(),
  status: z.enum(["running", "completed", "failed"]),
  progress: z.string(),
  tasks: z.array(
    z.object({
      id: z.string(),
      type: z.string(),
      status: z.string(),
      assignedAgent: z.string().nullable(),
      error: z.string().nullable(),
      blocked: z.string().nullable(),
    }),
  ),
});

export type WorkflowStatusView = z.infer<typeof WorkflowStatusViewSchema>;

export const ApiErrorBodySchema = z.object({ error: z.string(), code: z.string().optional() });

/** Parse `data` or throw a ValidationError naming every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${issues}`);
  }
  return result.data;
}
