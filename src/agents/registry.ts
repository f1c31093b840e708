import { AgentNotFoundError, ValidationError } from "../errors.js";
import type { TaskType } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { Agent, AgentCounts, AgentDescriptor, AgentSnapshot } from "./types.js";

const logger = log.child("agents");

export function snapshotAgent(agent: Agent): AgentSnapshot {
  return {
    id: agent.id,
    name: agent.name,
    capabilities: [...agent.capabilities],
    status: agent.status,
    currentTask: agent.currentTask,
    performanceScore: agent.performanceScore,
    lastHeartbeat: agent.lastHeartbeat,
  };
}

/**
 * Holds every registered agent. The busy/current-task pair is only ever
 * changed here, by `claim` and `release`, so the two can never disagree.
 */
export class AgentRegistry {
  private agents = new Map<string, Agent>();
  private sequence = 0;

  add(descriptor: AgentDescriptor, now = Date.now()): Agent {
    if (this.agents.has(descriptor.id)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Agent "${descriptor.id}" already registered`);
    }
    if (descriptor.capabilities.length === 0) {
      throw new ValidationError("VALIDATION_FAILED", `Agent "${descriptor.id}" has no capabilities`);
    }
    if (descriptor.performanceScore !== undefined && !Number.isFinite(descriptor.performanceScore)) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Agent "${descriptor.id}" has a non-finite performance score`,
      );
    }
    const agent: Agent = {
      id: descriptor.id,
      name: descriptor.name,
      capabilities: new Set(descriptor.capabilities),
      status: descriptor.offline ? "offline" : "available",
      currentTask: null,
      performanceScore: descriptor.performanceScore ?? 1.0,
      lastHeartbeat: now,
      registeredAt: this.sequence++,
    };
    this.agents.set(agent.id, agent);
    logger.info(`Registered agent "${agent.id}"`, { capabilities: descriptor.capabilities });
    return agent;
  }

  remove(id: string): boolean {
    const agent = this.agents.get(id);
    if (!agent) return false;
    if (agent.status === "busy") {
      throw new ValidationError("AGENT_BUSY", `Agent "${id}" is running task "${agent.currentTask}"`);
    }
    return this.agents.delete(id);
  }

  get(id: string): Agent | undefined {
    return this.agents.get(id);
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  ids(): string[] {
    return [...this.agents.keys()];
  }

  /** Agents that can run `type`, whatever their status. */
  withCapability(type: TaskType): Agent[] {
    return this.list().filter((a) => a.capabilities.has(type));
  }

  /**
   * The best available agent for `type`: highest performance score, earliest
   * registration on a tie. Does not claim it.
   */
  select(type: TaskType): Agent | undefined {
    let best: Agent | undefined;
    for (const agent of this.agents.values()) {
      if (agent.status !== "available" || !agent.capabilities.has(type)) continue;
      if (!best || agent.performanceScore > best.performanceScore) {
        best = agent;
      }
    }
    return best;
  }

  /** Mark an available agent busy with `taskId`. */
  claim(id: string, taskId: string): Agent {
    const agent = this.require(id);
    if (agent.status !== "available") {
      throw new ValidationError("AGENT_BUSY", `Agent "${id}" is ${agent.status}, cannot take "${taskId}"`);
    }
    agent.status = "busy";
    agent.currentTask = taskId;
    return agent;
  }

  /**
   * Return an agent to the pool. Ignored when the agent has since moved on
   * to another task or was removed.
   */
  release(id: string, taskId: string): boolean {
    const agent = this.agents.get(id);
    if (!agent || agent.currentTask !== taskId) {
      logger.warn(`Release of "${id}" for "${taskId}" ignored`, { currentTask: agent?.currentTask ?? null });
      return false;
    }
    agent.status = "available";
    agent.currentTask = null;
    return true;
  }

  setOffline(id: string): void {
    const agent = this.require(id);
    if (agent.status === "busy") {
      throw new ValidationError("AGENT_BUSY", `Agent "${id}" is running task "${agent.currentTask}"`);
    }
    agent.status = "offline";
  }

  setAvailable(id: string): void {
    const agent = this.require(id);
    if (agent.status === "offline") agent.status = "available";
  }

  heartbeat(now = Date.now()): void {
    for (const agent of this.agents.values()) {
      agent.lastHeartbeat = now;
    }
  }

  counts(): AgentCounts {
    const counts: AgentCounts = { total: 0, available: 0, busy: 0, offline: 0 };
    for (const agent of this.agents.values()) {
      counts.total++;
      counts[agent.status]++;
    }
    return counts;
  }

  snapshot(): AgentSnapshot[] {
    return this.list().map(snapshotAgent);
  }

  private require(id: string): Agent {
    const agent = this.agents.get(id);
    if (!agent) throw new AgentNotFoundError(id);
    return agent;
  }
}
