/**
 * Orthonormal basis around a surface normal.
 */

import { Vector3 } from './vector3.js'

const RIGHT = new Vector3(-1, 0, 0)
const LEFT = new Vector3(1, 0, 0)
const UP = new Vector3(0, 1, 0)

export interface TangentFrame {
  tangent: Vector3
  bitangent: Vector3
}

/**
 * Build `{ tangent, normal, bitangent }` around a unit `normal`.
 *
 * The seed axis is (-1, 0, 0), swapped for (0, 1, 0) when the normal lies
 * (anti)parallel to it and the cross product would vanish. The tangent is
 * re-derived from the bitangent, so the seed never has to be orthogonal to
 * the normal.
 */
export function buildTangentFrame(normal: Vector3): TangentFrame {
  const seed = normal.isEquivalent(RIGHT) || normal.isEquivalent(LEFT) ? UP : RIGHT
  const bitangent = normal.cross(seed).normalize()
  const tangent = bitangent.cross(normal).normalize()
  return { tangent, bitangent }
}
