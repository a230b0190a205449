/**
 * Environment variable validation. Fails fast on startup.
 *
 * Render defaults (samples, bounces, background) live in @spheretrace/config;
 * this module only covers the HTTP process itself.
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function positiveInt(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined) return fallback
  const val = Number(raw)
  if (!Number.isInteger(val) || val <= 0) {
    throw new Error(
      `Invalid environment variable ${key}=${raw}: expected a positive integer. ` +
      `Set it in .env or your deployment configuration.`,
    )
  }
  return val
}

export const env = {
  PORT: positiveInt('PORT', 4000),
  NODE_ENV: optional('NODE_ENV', 'development'),
  /** Renders allowed per client per minute */
  RENDER_RATE_LIMIT: positiveInt('RENDER_RATE_LIMIT', 30),
} as const
