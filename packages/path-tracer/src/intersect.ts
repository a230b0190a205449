/**
 * Analytic ray-sphere intersection.
 *
 * Solves a·t² + b·t + c = 0 with a = d·d, b = 2 d·(o - c), c = |o - c|² - r².
 * The far root t0 is always tried; the near root t1 only when the
 * discriminant exceeds EPSILON, so near-tangent double roots collapse to a
 * single reported hit. Hits behind the origin (t < 0) are dropped and the
 * remainder are ordered nearest first.
 */

import type { Ray, Sphere } from './geometry.js'
import { EPSILON, Vector3 } from './vector3.js'

/** Return shape selector for the integrator's scan. */
export type IntersectionMode = 'list' | 'buffer'

/**
 * Write the accepted root distances into `out`, nearest first, and return
 * how many were accepted.
 */
function solveRoots(ray: Ray, sphere: Sphere, out: Float64Array): number {
  const oc = ray.origin.sub(sphere.center)
  const a = ray.direction.dot(ray.direction)
  const b = 2 * ray.direction.dot(oc)
  const c = oc.dot(oc) - sphere.radius * sphere.radius
  const discriminant = b * b - 4 * a * c

  if (discriminant < 0) return 0

  let count = 0
  const sqrtDisc = Math.sqrt(discriminant)

  const t0 = (-b + sqrtDisc) / (2 * a)
  if (t0 >= 0) out[count++] = t0

  if (discriminant > EPSILON) {
    const t1 = (-b - sqrtDisc) / (2 * a)
    if (t1 >= 0) {
      out[count++] = t1
      // Smallest non-negative root is the entry point
      if (count === 2 && t1 < t0) {
        out[0] = t1
        out[1] = t0
      }
    }
  }

  return count
}

function pointAt(ray: Ray, t: number): Vector3 {
  return ray.origin.add(ray.direction.scale(t))
}

/** 0, 1 or 2 hit points, nearest first. */
export function intersect(ray: Ray, sphere: Sphere): Vector3[] {
  const roots = new Float64Array(2)
  const count = solveRoots(ray, sphere, roots)
  return Array.from(roots.subarray(0, count), (t) => pointAt(ray, t))
}

/** Fixed two-slot result buffer reused across calls. */
export interface HitBuffer {
  readonly roots: Float64Array
  readonly points: [Vector3, Vector3]
}

export function createHitBuffer(): HitBuffer {
  return { roots: new Float64Array(2), points: [Vector3.ZERO, Vector3.ZERO] }
}

/**
 * Same contract as {@link intersect}, writing into `out` instead of
 * allocating a list. Returns the number of valid slots; slots past the
 * count hold stale values.
 */
export function intersectInto(ray: Ray, sphere: Sphere, out: HitBuffer): number {
  const count = solveRoots(ray, sphere, out.roots)
  if (count > 0) out.points[0] = pointAt(ray, out.roots[0] ?? 0)
  if (count > 1) out.points[1] = pointAt(ray, out.roots[1] ?? 0)
  return count
}
