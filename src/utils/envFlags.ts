// Shared helpers for reading environment flags. Everything that decides
// behaviour from process.env goes through here so tests can rely on one
// definition of "test runtime" and of a truthy flag.

type ProcessEnv = Record<string, string | undefined>;

function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

/**
 * Interpret a raw flag value. Accepts 1/true/yes (any case) as enabled.
 */
export function isTruthyFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  const normalised = raw.trim().toLowerCase();
  return normalised === '1' || normalised === 'true' || normalised === 'yes';
}
