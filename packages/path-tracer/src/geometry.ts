/**
 * Scene value types: rays, materials, spheres and the scene that owns them.
 */

import { InvalidGeometryError } from './errors.js'
import type { Vector3 } from './vector3.js'

// ---------------------------------------------------------------------------
// Ray
// ---------------------------------------------------------------------------

export interface Ray {
  readonly origin: Vector3
  /** Need not be unit length for intersection; sampled and primary rays are. */
  readonly direction: Vector3
}

// ---------------------------------------------------------------------------
// Material
// ---------------------------------------------------------------------------

/**
 * Diffuse surface description.
 *
 * Only Lambertian shading is implemented: `roughness` is carried for forward
 * compatibility and is not read by the integrator.
 */
export interface Material {
  /** Diffuse reflectance per channel, nominally [0, 1] */
  readonly albedo: Vector3
  /** Radiant exitance per channel; values above 1 model light sources */
  readonly emissive: Vector3
  readonly roughness: number
}

// ---------------------------------------------------------------------------
// Sphere
// ---------------------------------------------------------------------------

export interface Sphere {
  readonly center: Vector3
  readonly radius: number
  /** Index into the owning scene's material table */
  readonly materialId: number
}

/** @throws InvalidGeometryError when the radius is not a positive finite number */
export function createSphere(center: Vector3, radius: number, materialId: number): Sphere {
  if (!(radius > 0) || !Number.isFinite(radius)) {
    throw new InvalidGeometryError(`Sphere radius must be positive, got ${radius}`)
  }
  return Object.freeze({ center, radius, materialId })
}

// ---------------------------------------------------------------------------
// Scene
// ---------------------------------------------------------------------------

/**
 * Material table plus sphere list. Material ids are insertion indices; sphere
 * order is scan order and has no effect on which hit wins.
 */
export interface Scene {
  readonly materials: readonly Material[]
  readonly spheres: readonly Sphere[]
}

/**
 * Freeze a scene after checking every sphere resolves to a material.
 *
 * @throws InvalidGeometryError on a dangling material id
 */
export function createScene(materials: readonly Material[], spheres: readonly Sphere[]): Scene {
  spheres.forEach((sphere, index) => {
    if (!Number.isInteger(sphere.materialId) || materials[sphere.materialId] === undefined) {
      throw new InvalidGeometryError(
        `Sphere ${index} references material ${sphere.materialId}, but the scene has ${materials.length}`,
      )
    }
  })
  return Object.freeze({
    materials: Object.freeze([...materials]),
    spheres: Object.freeze([...spheres]),
  })
}

/** Look up a sphere's material. */
export function materialOf(scene: Scene, sphere: Sphere): Material {
  const material = scene.materials[sphere.materialId]
  if (material === undefined) {
    throw new InvalidGeometryError(`Unknown material id ${sphere.materialId}`)
  }
  return material
}
