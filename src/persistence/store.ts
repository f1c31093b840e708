import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { isTaskType } from "../planner/types.js";
import type { TaskParameters, TaskSnapshot, TaskStatus, WorkflowSummary } from "../planner/types.js";
import { deriveStatus, progressString } from "../planner/workflow-status.js";

const DEFAULT_DB_DIR = join(homedir(), ".taskmesh");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "orchestrator.db");

export type StoredWorkflow = {
  workflowId: string;
  workflowType: string;
  priority: number;
  parameters: TaskParameters;
  taskIds: string[];
  createdAt: number;
};

export type StoredTask = {
  id: string;
  workflowId: string;
  type: TaskSnapshot["type"];
  priority: number;
  status: TaskStatus;
  assignedAgent: string | null;
  parameters: TaskParameters;
  result: unknown;
  error: string | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
};

/**
 * Audit trail of workflows and their tasks. Rows are upserted as the
 * orchestrator reports changes; workflow status is derived on read.
 */
export class WorkflowStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workflows (
        workflow_id   TEXT PRIMARY KEY,
        workflow_type TEXT NOT NULL,
        priority      INTEGER NOT NULL,
        parameters    TEXT NOT NULL DEFAULT '{}',
        task_ids      TEXT NOT NULL DEFAULT '[]',
        created_at    INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS tasks (
        task_id        TEXT PRIMARY KEY,
        workflow_id    TEXT NOT NULL,
        task_type      TEXT NOT NULL,
        priority       INTEGER NOT NULL,
        status         TEXT NOT NULL,
        assigned_agent TEXT,
        parameters     TEXT NOT NULL DEFAULT '{}',
        result         TEXT,
        error          TEXT,
        created_at     INTEGER NOT NULL,
        started_at     INTEGER,
        completed_at   INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_workflows_created ON workflows(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_tasks_workflow ON tasks(workflow_id);
    `);
  }

  saveWorkflow(workflow: StoredWorkflow): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO workflows (workflow_id, workflow_type, priority, parameters, task_ids, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      workflow.workflowId,
      workflow.workflowType,
      workflow.priority,
      JSON.stringify(workflow.parameters),
      JSON.stringify(workflow.taskIds),
      workflow.createdAt,
    );
  }

  saveTask(task: TaskSnapshot): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO tasks (task_id, workflow_id, task_type, priority, status, assigned_agent,
        parameters, result, error, created_at, started_at, completed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      task.id,
      task.workflowId,
      task.type,
      task.priority,
      task.status,
      task.assignedAgent,
      JSON.stringify(task.parameters),
      task.result === null || task.result === undefined ? null : JSON.stringify(task.result),
      task.error,
      task.createdAt,
      task.startedAt,
      task.completedAt,
    );
  }

  getWorkflow(workflowId: string): StoredWorkflow | undefined {
    const row = this.db.prepare("SELECT * FROM workflows WHERE workflow_id = ?").get(workflowId) as
      | WorkflowRow
      | undefined;
    return row ? rowToWorkflow(row) : undefined;
  }

  listWorkflows(limit = 50): StoredWorkflow[] {
    const rows = this.db
      .prepare("SELECT * FROM workflows ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(limit) as WorkflowRow[];
    return rows.map(rowToWorkflow);
  }

  tasksFor(workflowId: string): StoredTask[] {
    const rows = this.db
      .prepare("SELECT * FROM tasks WHERE workflow_id = ? ORDER BY priority, rowid")
      .all(workflowId) as TaskRow[];
    return rows.map(rowToTask);
  }

  /** Workflow summaries with status and progress computed from stored tasks. */
  summaries(limit = 50): WorkflowSummary[] {
    return this.listWorkflows(limit).map((w) => {
      const tasks = this.tasksFor(w.workflowId);
      return {
        workflowId: w.workflowId,
        workflowType: w.workflowType,
        status: deriveStatus(tasks),
        progress: progressString(tasks),
        createdAt: w.createdAt,
      };
    });
  }

  close(): void {
    this.db.close();
  }
}

type WorkflowRow = {
  workflow_id: string;
  workflow_type: string;
  priority: number;
  parameters: string;
  task_ids: string;
  created_at: number;
};

type TaskRow = {
  task_id: string;
  workflow_id: string;
  task_type: string;
  priority: number;
  status: string;
  assigned_agent: string | null;
  parameters: string;
  result: string | null;
  error: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
};

const TASK_STATUSES: readonly TaskStatus[] = ["pending", "running", "completed", "failed"];

function toStatus(value: string): TaskStatus {
  const status = TASK_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown task status in store: ${value}`);
  return status;
}

function parseObject(json: string): TaskParameters {
  const value: unknown = JSON.parse(json);
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function parseStringArray(json: string): string[] {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function rowToWorkflow(row: WorkflowRow): StoredWorkflow {
  return {
    workflowId: row.workflow_id,
    workflowType: row.workflow_type,
    priority: row.priority,
    parameters: parseObject(row.parameters),
    taskIds: parseStringArray(row.task_ids),
    createdAt: row.created_at,
  };
}

function rowToTask(row: TaskRow): StoredTask {
  if (!isTaskType(row.task_type)) {
    throw new Error(`Unknown task type in store: ${row.task_type}`);
  }
  return {
    id: row.task_id,
    workflowId: row.workflow_id,
    type: row.task_type,
    priority: row.priority,
    status: toStatus(row.status),
    assignedAgent: row.assigned_agent,
    parameters: parseObject(row.parameters),
    result: row.result === null ? null : JSON.parse(row.result),
    error: row.error,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}
