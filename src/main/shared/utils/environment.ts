/**
 * Check if the tool is running in development mode.
 * This is determined by the NODE_ENV environment variable.
 *
 * @returns true if NODE_ENV is `development`
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development'
}

export function isTestEnvironment(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === 'test'
}
