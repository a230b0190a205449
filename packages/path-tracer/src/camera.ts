/**
 * Camera basis and primary ray generation.
 */

import { DegenerateCameraBasisError } from './errors.js'
import type { Ray } from './geometry.js'
import type { Vector3 } from './vector3.js'
import { EPSILON } from './vector3.js'

export interface CameraConfig {
  position: Vector3
  lookAtTarget: Vector3
  upHint: Vector3
}

export interface Camera {
  readonly position: Vector3
  readonly right: Vector3
  /** Not unit length; its magnitude sets the vertical field of view */
  readonly up: Vector3
  readonly width: number
  readonly height: number
  readonly dx: number
  readonly dy: number
}

function unit(v: Vector3, what: string): Vector3 {
  if (!(v.length() >= EPSILON)) {
    throw new DegenerateCameraBasisError(`${what} has zero length`)
  }
  return v.normalize()
}

/**
 * Build the camera basis for a `width` x `height` image.
 *
 * right = normalize(normalize(upHint) x normalize(target - position))
 * up    = right x normalize(position)
 *
 * `up` is derived from the position vector rather than the view direction,
 * which only matches a conventional look-at when the target is the origin.
 * Every collapse check runs on unit inputs, so it does not depend on scale.
 *
 * @throws DegenerateCameraBasisError when any basis vector collapses
 */
export function createCamera(config: CameraConfig, width: number, height: number): Camera {
  assertImageSize(width, height)

  const forward = unit(config.lookAtTarget.sub(config.position), 'view direction (target - position)')
  const upHint = unit(config.upHint, 'up hint')
  const right = unit(upHint.cross(forward), 'right vector (up hint parallel to view direction)')
  const up = right.cross(unit(config.position, 'camera position'))
  if (up.length() < EPSILON) {
    throw new DegenerateCameraBasisError('up vector has zero length (position parallel to right vector)')
  }

  return Object.freeze({
    position: config.position,
    right,
    up,
    width,
    height,
    dx: 2 / width,
    dy: 2 / height,
  })
}

export function assertImageSize(width: number, height: number): void {
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new RangeError(`Image size must be positive integers, got ${width}x${height}`)
  }
}

/**
 * Primary ray through pixel (i, j); column i runs left to right, row j top to
 * bottom. The near-plane point is measured from the world origin across
 * [-1, 1] x [-1, 1] in the right/up basis.
 */
export function primaryRay(camera: Camera, i: number, j: number): Ray {
  const nearPlane = camera.right
    .scale(-1 + camera.dx * i)
    .add(camera.up.scale(1 - camera.dy * j))
  return {
    origin: camera.position,
    direction: nearPlane.sub(camera.position).normalize(),
  }
}
