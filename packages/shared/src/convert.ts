/**
 * Conversion between validated wire documents and core scene types.
 */

import {
  SceneBuilder,
  Vector3,
  type CameraConfig,
  type Scene,
} from '@spheretrace/path-tracer'
import type { CameraInput, SceneInput } from './schemas/index.js'

export function toScene(input: SceneInput): Scene {
  const builder = new SceneBuilder()
  for (const m of input.materials) {
    builder.addMaterial({
      albedo: Vector3.fromArray(m.albedo),
      emissive: Vector3.fromArray(m.emissive),
      roughness: m.roughness,
    })
  }
  for (const s of input.spheres) {
    builder.addSphere(Vector3.fromArray(s.center), s.radius, s.materialRef)
  }
  return builder.build()
}

export function toCameraConfig(input: CameraInput): CameraConfig {
  return {
    position: Vector3.fromArray(input.position),
    lookAtTarget: Vector3.fromArray(input.lookAtTarget),
    upHint: Vector3.fromArray(input.upHint),
  }
}

export function fromScene(scene: Scene): SceneInput {
  return {
    materials: scene.materials.map((m) => ({
      albedo: m.albedo.toArray(),
      emissive: m.emissive.toArray(),
      roughness: m.roughness,
    })),
    spheres: scene.spheres.map((s) => ({
      center: s.center.toArray(),
      radius: s.radius,
      materialRef: s.materialId,
    })),
  }
}

export function fromCameraConfig(camera: CameraConfig): CameraInput {
  return {
    position: camera.position.toArray(),
    lookAtTarget: camera.lookAtTarget.toArray(),
    upHint: camera.upHint.toArray(),
  }
}
