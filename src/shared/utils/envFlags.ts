// Shared helpers for reading environment flags. The engine under
// src/shared stays free of the client's logger, so its optional
// diagnostics are gated by these flags and written to the console.

type ProcessEnv = Record<string, string | undefined>;

function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const value = getProcessEnv()?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when
 * NODE_ENV says otherwise (e.g. a developer .env with NODE_ENV=development).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Verbose engine diagnostics (ASCII grid parsing, move generation).
 * Enable with HIVE_ENGINE_DEBUG=1.
 */
export function isEngineDebugEnabled(): boolean {
  return flagEnabled('HIVE_ENGINE_DEBUG');
}

/**
 * Engine trace logging - only logs when HIVE_ENGINE_DEBUG is set.
 */
export function engineTraceLog(tag: string, ...args: unknown[]): void {
  if (isEngineDebugEnabled()) {
    // eslint-disable-next-line no-console
    console.log(`[${tag}]`, ...args);
  }
}
