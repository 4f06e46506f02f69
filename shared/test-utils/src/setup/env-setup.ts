/**
 * Test Environment Setup
 *
 * Provides isolated environment variable management for tests.
 */

const originalEnv: NodeJS.ProcessEnv = { ...process.env };

const defaultTestEnv: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  LOG_FORMAT: 'json',
};

/**
 * Setup test environment with default values and optional overrides
 */
export function setupTestEnv(overrides: Record<string, string> = {}): void {
  for (const [key, value] of Object.entries({ ...defaultTestEnv, ...overrides })) {
    process.env[key] = value;
  }
}

/**
 * Restore original environment (call in afterAll)
 */
export function restoreEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (!(key in originalEnv)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, originalEnv);
}

/**
 * Execute a function with temporary environment changes.
 * An `undefined` override removes the variable for the duration.
 */
export async function withEnv<T>(
  envOverrides: Record<string, string | undefined>,
  fn: () => T | Promise<T>
): Promise<T> {
  const backup: Record<string, string | undefined> = {};

  for (const [key, value] of Object.entries(envOverrides)) {
    backup[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    return await fn();
  } finally {
    for (const [key, value] of Object.entries(backup)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}
