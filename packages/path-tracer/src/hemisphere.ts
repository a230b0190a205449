/**
 * Uniform (solid-angle) hemisphere sampling.
 *
 * u0 is used directly as cos(theta) against the pole, u1 as the azimuth
 * fraction. This is not cosine-weighted: the integrator's estimator
 * depends on the uniform density.
 */

import { InvariantViolationError } from './errors.js'
import { buildTangentFrame } from './tangent-frame.js'
import { EPSILON, Vector3 } from './vector3.js'

/**
 * Map two uniform draws in [0, 1) to a direction in the hemisphere around
 * `normal`. Local +y is the pole and maps onto `normal`; local x and z map
 * onto the tangent and bitangent.
 *
 * With `checkInvariants` set, a result pointing below the surface throws
 * {@link InvariantViolationError}. It is never checked otherwise.
 */
export function sampleHemisphere(
  normal: Vector3,
  u0: number,
  u1: number,
  checkInvariants = false,
): Vector3 {
  const sinTheta = Math.sqrt(1 - u0 * u0)
  const phi = 2 * Math.PI * u1
  const lx = sinTheta * Math.cos(phi)
  const ly = u0
  const lz = sinTheta * Math.sin(phi)

  const { tangent, bitangent } = buildTangentFrame(normal)
  const direction = new Vector3(
    lx * tangent.x + ly * normal.x + lz * bitangent.x,
    lx * tangent.y + ly * normal.y + lz * bitangent.y,
    lx * tangent.z + ly * normal.z + lz * bitangent.z,
  )

  if (checkInvariants) {
    const cosine = direction.dot(normal)
    if (cosine < -EPSILON) {
      throw new InvariantViolationError(
        `sampled direction has dot(direction, normal) = ${cosine} for u0=${u0}, u1=${u1}`,
      )
    }
  }

  return direction
}
