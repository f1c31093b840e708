import type { TaskType } from "../planner/types.js";

export type AgentStatus = "available" | "busy" | "offline";

/** What a caller supplies to register an agent. */
export type AgentDescriptor = {
  id: string;
  name: string;
  capabilities: readonly TaskType[];
  /** Tie-breaker between eligible agents; higher wins. Defaults to 1.0. */
  performanceScore?: number;
  /** Register as offline instead of available. */
  offline?: boolean;
};

export type Agent = {
  readonly id: string;
  readonly name: string;
  readonly capabilities: ReadonlySet<TaskType>;
  status: AgentStatus;
  /** Non-null exactly when status is "busy". */
  currentTask: string | null;
  performanceScore: number;
  lastHeartbeat: number;
  readonly registeredAt: number;
};

/** Plain, JSON-safe copy of an agent handed out to callers. */
export type AgentSnapshot = {
  id: string;
  name: string;
  capabilities: TaskType[];
  status: AgentStatus;
  currentTask: string | null;
  performanceScore: number;
  lastHeartbeat: number;
};

export type AgentCounts = {
  total: number;
  available: number;
  busy: number;
  offline: number;
};
