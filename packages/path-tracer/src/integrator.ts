/**
 * Recursive radiance estimator.
 *
 * One-sample Monte Carlo estimate of the rendering equation with emission
 * and a single uniform-hemisphere bounce per hit. There is no direct light
 * sampling: light is only found when the bounce chain happens to strike an
 * emissive sphere, so variance is high and convergence needs many samples.
 */

import type { Ray, Scene, Sphere } from './geometry.js'
import { materialOf } from './geometry.js'
import { sampleHemisphere } from './hemisphere.js'
import type { IntersectionMode } from './intersect.js'
import { createHitBuffer, intersect, intersectInto } from './intersect.js'
import type { PRNG } from './random.js'
import { EPSILON, Vector3, lerp } from './vector3.js'

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type BackgroundMode = 'black' | 'skyGradient'

export const BACKGROUND_MODES: readonly BackgroundMode[] = ['black', 'skyGradient']

/** Zenith color of the sky gradient; the horizon end is black. */
export const SKY_COLOR = new Vector3(0.25, 0.55, 0.75)

export const DEFAULT_MAX_BOUNCES = 6
/** Ceiling on path depth; `tracePath` recurses once per bounce. */
export const MAX_BOUNCES = 64

export interface TraceOptions {
  /** Recursion depth at which zero radiance is returned */
  maxBounces: number
  backgroundMode: BackgroundMode
  random: PRNG
  /** Check the hemisphere sampler's post-condition on every bounce */
  debugInvariants?: boolean
  /** 'list' allocates per test, 'buffer' reuses a two-slot buffer */
  intersection?: IntersectionMode
}

export function assertMaxBounces(maxBounces: number): void {
  if (!Number.isInteger(maxBounces) || maxBounces < 1 || maxBounces > MAX_BOUNCES) {
    throw new RangeError(`maxBounces must be an integer in [1, ${MAX_BOUNCES}], got ${maxBounces}`)
  }
}

// ---------------------------------------------------------------------------
// Background
// ---------------------------------------------------------------------------

/** Radiance for a ray that escapes the scene. */
export function background(ray: Ray, mode: BackgroundMode): Vector3 {
  switch (mode) {
    case 'black':
      return Vector3.ZERO
    case 'skyGradient':
      return lerp(Vector3.ZERO, SKY_COLOR, ray.direction.y)
  }
}

// ---------------------------------------------------------------------------
// Nearest hit
// ---------------------------------------------------------------------------

export interface Hit {
  sphere: Sphere
  point: Vector3
  distance: number
}

const scanBuffer = createHitBuffer()

/**
 * Brute-force scan over every sphere. Each sphere is ranked by the distance
 * of its first reported hit point; ties keep the earlier sphere.
 */
export function findNearestHit(
  ray: Ray,
  scene: Scene,
  mode: IntersectionMode = 'list',
): Hit | null {
  let nearest: Hit | null = null

  for (const sphere of scene.spheres) {
    let point: Vector3 | undefined
    if (mode === 'buffer') {
      if (intersectInto(ray, sphere, scanBuffer) > 0) point = scanBuffer.points[0]
    } else {
      point = intersect(ray, sphere)[0]
    }
    if (point === undefined) continue

    const distance = point.sub(ray.origin).length()
    if (nearest === null || distance < nearest.distance) {
      nearest = { sphere, point, distance }
    }
  }

  return nearest
}

// ---------------------------------------------------------------------------
// Path tracing
// ---------------------------------------------------------------------------

/**
 * Estimate radiance arriving along `ray`.
 *
 * L = Le + albedo * L(bounce) * (n . w), with w drawn uniformly over the
 * hemisphere and the bounce origin pushed EPSILON along the normal to keep
 * it off the surface it left. Depth is bounded by `maxBounces`; there is no
 * russian roulette.
 */
export function tracePath(ray: Ray, scene: Scene, depth: number, options: TraceOptions): Vector3 {
  if (depth >= options.maxBounces) {
    return Vector3.ZERO
  }

  const hit = findNearestHit(ray, scene, options.intersection)
  if (hit === null) {
    return background(ray, options.backgroundMode)
  }

  const material = materialOf(scene, hit.sphere)
  const normal = hit.point.sub(hit.sphere.center).normalize()

  const u0 = options.random.random()
  const u1 = options.random.random()
  const direction = sampleHemisphere(normal, u0, u1, options.debugInvariants)

  const bounce: Ray = { origin: hit.point.add(normal.scale(EPSILON)), direction }
  const incoming = tracePath(bounce, scene, depth + 1, options)

  return material.emissive.add(material.albedo.mul(incoming).scale(normal.dot(direction)))
}
