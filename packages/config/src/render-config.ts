/** Render defaults, overridable per process through environment variables. */

import { MAX_BOUNCES } from '@spheretrace/path-tracer'
import type { BackgroundMode, IntersectionMode } from '@spheretrace/path-tracer'

export interface RenderConfig {
  backgroundMode: BackgroundMode
  samplesPerPixel: number
  maxBounces: number
  /** Check sampler post-conditions on every bounce (slow) */
  debugInvariants: boolean
  intersection: IntersectionMode
}

export type RenderConfigKey = keyof RenderConfig

/** Environment variable consulted for each key. */
export const ENV_KEYS: Record<RenderConfigKey, string> = {
  backgroundMode: 'SPHERETRACE_BACKGROUND_MODE',
  samplesPerPixel: 'SPHERETRACE_SAMPLES_PER_PIXEL',
  maxBounces: 'SPHERETRACE_MAX_BOUNCES',
  debugInvariants: 'SPHERETRACE_DEBUG_INVARIANTS',
  intersection: 'SPHERETRACE_INTERSECTION',
}

/** Defaults: black background, 4 samples, 6 bounces. */
export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  backgroundMode: 'black',
  samplesPerPixel: 4,
  maxBounces: 6,
  debugInvariants: false,
  intersection: 'list',
}

type Env = Record<string, string | undefined>

function readEnvFlag(env: Env, key: string): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

function readEnvPositiveInt(env: Env, key: string, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const val = env[key]
  if (val === undefined || !/^\d+$/.test(val)) return undefined
  const n = Number(val)
  return n > 0 && n <= max ? n : undefined
}

function readEnvChoice<T extends string>(env: Env, key: string, choices: readonly T[]): T | undefined {
  const val = env[key]
  return choices.find((choice) => choice === val)
}

/**
 * Resolve the render config against `env`. Unset, malformed or out-of-range
 * values fall back to the default for that key.
 */
export function resolveRenderConfig(env: Env): RenderConfig {
  return {
    backgroundMode:
      readEnvChoice(env, ENV_KEYS.backgroundMode, ['black', 'skyGradient'] as const) ??
      DEFAULT_RENDER_CONFIG.backgroundMode,
    samplesPerPixel: readEnvPositiveInt(env, ENV_KEYS.samplesPerPixel) ?? DEFAULT_RENDER_CONFIG.samplesPerPixel,
    maxBounces: readEnvPositiveInt(env, ENV_KEYS.maxBounces, MAX_BOUNCES) ?? DEFAULT_RENDER_CONFIG.maxBounces,
    debugInvariants: readEnvFlag(env, ENV_KEYS.debugInvariants) ?? DEFAULT_RENDER_CONFIG.debugInvariants,
    intersection:
      readEnvChoice(env, ENV_KEYS.intersection, ['list', 'buffer'] as const) ??
      DEFAULT_RENDER_CONFIG.intersection,
  }
}

/** Resolved once for this process (env overrides > defaults). */
export const renderConfig: RenderConfig = resolveRenderConfig(
  typeof process !== 'undefined' ? process.env : {},
)
