import { readFileSync } from "node:fs";
import { ConfigError, errorMessage } from "../errors.js";
import { AgentFileSchema, parseOrThrow } from "../schemas.js";
import type { AgentDescriptor } from "./types.js";

/** The agent set a stand-alone orchestrator starts with. */
export const DEFAULT_AGENTS: readonly AgentDescriptor[] = [
  {
    id: "pr_agent",
    name: "Pull Request Agent",
    capabilities: ["create_pr", "merge_pr", "list_prs"],
  },
  {
    id: "report_agent",
    name: "Report Agent",
    capabilities: ["generate_report", "create_local_url", "save_report"],
  },
  {
    id: "branch_agent",
    name: "Branch Agent",
    capabilities: [
      "create_branch",
      "create_branch_from_base",
      "checkout_branch",
      "push_branch",
      "delete_branch",
      "list_branches",
    ],
  },
];

/** Read `{ "agents": [...] }` from a JSON file. */
export function loadAgentFile(path: string): AgentDescriptor[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read agent file ${path}: ${errorMessage(err)}`);
  }
  return parseOrThrow(AgentFileSchema, raw, `agent file ${path}`).agents;
}
