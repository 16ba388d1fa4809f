// Small helpers for reading environment flags. Kept in shared/ so config
// code and tests read process.env the same way.

type ProcessEnv = Record<string, string | undefined>;

export function readEnv(name: string, env: ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process. Jest always sets
 * JEST_WORKER_ID, even when NODE_ENV was set to something else.
 */
export function isJestRuntime(env: ProcessEnv = process.env): boolean {
  return readEnv('JEST_WORKER_ID', env) !== undefined;
}

