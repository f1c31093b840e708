export type OrchestratorConfig = {
  scheduler: {
    tickIntervalMs: number;
    heartbeatIntervalMs: number;
    errorBackoffMs: number;
    /** Re-warn about a task no agent could take every N missed ticks. */
    warnEveryAttempts: number;
  };
  executor: {
    url: string;
    callPath: string;
    timeoutMs: number;
    healthTimeoutMs: number;
  };
  workflows: {
    defaultPriority: number;
  };
  server: {
    port: number;
    host: string;
  };
  cli: {
    pollIntervalMs: number;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  scheduler: {
    tickIntervalMs: 1_000,
    heartbeatIntervalMs: 5_000,
    errorBackoffMs: 5_000,
    warnEveryAttempts: 30,
  },
  executor: {
    url: "http://127.0.0.1:5000",
    callPath: "/call",
    timeoutMs: 60_000,
    healthTimeoutMs: 5_000,
  },
  workflows: {
    defaultPriority: 2,
  },
  server: {
    port: 3000,
    host: "127.0.0.1",
  },
  cli: {
    pollIntervalMs: 1_000,
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key in base) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/** Override config values. Each section is merged over the defaults; `undefined` keeps the default. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  const base = structuredClone(DEFAULTS);
  current = {
    scheduler: mergeSection(base.scheduler, overrides.scheduler),
    executor: mergeSection(base.executor, overrides.executor),
    workflows: mergeSection(base.workflows, overrides.workflows),
    server: mergeSection(base.server, overrides.server),
    cli: mergeSection(base.cli, overrides.cli),
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
