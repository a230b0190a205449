/**
 * Scene authoring: a material table plus helpers that rest small spheres on
 * a larger reference sphere.
 */

import { InvalidGeometryError } from './errors.js'
import type { CameraConfig } from './camera.js'
import type { Material, Scene, Sphere } from './geometry.js'
import { createScene, createSphere } from './geometry.js'
import { Vector3 } from './vector3.js'

export class SceneBuilder {
  private readonly materials: Material[] = []
  private readonly spheres: Sphere[] = []

  /** Append a material and return its id (the insertion index). */
  addMaterial(material: Material): number {
    this.materials.push(Object.freeze({ ...material }))
    return this.materials.length - 1
  }

  addSphere(center: Vector3, radius: number, materialId: number): Sphere {
    const sphere = createSphere(center, radius, materialId)
    this.spheres.push(sphere)
    return sphere
  }

  /**
   * Sphere centered at `center` that touches `reference` from outside:
   * radius = |center - reference.center| - reference.radius.
   */
  tangentSphere(reference: Sphere, center: Vector3, materialId: number): Sphere {
    return this.offsetSphere(reference, center, 0, materialId)
  }

  /**
   * Like {@link tangentSphere}, shrunk by a further `offset` (a negative
   * offset sinks the sphere into the reference).
   */
  offsetSphere(reference: Sphere, center: Vector3, offset: number, materialId: number): Sphere {
    const radius = center.distance(reference.center) - reference.radius - offset
    if (!(radius > 0)) {
      throw new InvalidGeometryError(
        `Sphere at (${center.x}, ${center.y}, ${center.z}) would have radius ${radius}; ` +
        `its center must lie more than ${reference.radius + offset} from the reference center`,
      )
    }
    return this.addSphere(center, radius, materialId)
  }

  build(): Scene {
    return createScene(this.materials, this.spheres)
  }
}

// ---------------------------------------------------------------------------
// Showcase scene
// ---------------------------------------------------------------------------

export const DEFAULT_CAMERA: CameraConfig = {
  position: new Vector3(0, 0.5, -1),
  lookAtTarget: new Vector3(0, 0, 0),
  upHint: new Vector3(0, 1, 0),
}

const GROUND_RADIUS = 100

function mat(albedo: [number, number, number], emissive: [number, number, number]): Material {
  return { albedo: Vector3.fromArray(albedo), emissive: Vector3.fromArray(emissive), roughness: 1 }
}

/**
 * Seven small spheres resting on a large white ground sphere, three of them
 * emissive (green-white, warm and cool).
 */
export function buildDefaultScene(): Scene {
  const b = new SceneBuilder()

  const white = b.addMaterial(mat([1, 1, 1], [0, 0, 0]))
  const greenLight = b.addMaterial(mat([0.5, 1, 0.5], [10, 10, 10]))
  const red = b.addMaterial(mat([1, 0.5, 0.5], [0, 0, 0]))
  const blue = b.addMaterial(mat([0.5, 0.5, 1], [0, 0, 0]))
  const mint = b.addMaterial(mat([0.5, 1, 0.75], [0, 0, 0]))
  const warmLight = b.addMaterial(mat([1, 1, 0.5], [10, 5, 5]))
  const white2 = b.addMaterial(mat([1, 1, 1], [0, 0, 0]))
  const coolLight = b.addMaterial(mat([0.5, 1, 1], [5, 5, 10]))

  const ground = b.addSphere(new Vector3(0, -GROUND_RADIUS, 0), GROUND_RADIUS, white)
  b.tangentSphere(ground, new Vector3(0, 0.125, 0), greenLight)
  b.tangentSphere(ground, new Vector3(-0.5, 0.125, 0), red)
  b.tangentSphere(ground, new Vector3(0.5, 0.25, 0.5), blue)
  b.tangentSphere(ground, new Vector3(0.25, 0.05, -0.25), mint)
  b.tangentSphere(ground, new Vector3(-0.25, 0.5, 1.5), warmLight)
  b.tangentSphere(ground, new Vector3(0.25, 0.1, 0.25), white2)
  b.tangentSphere(ground, new Vector3(-0.65, 0.05, -0.25), coolLight)

  return b.build()
}
