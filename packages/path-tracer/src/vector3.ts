/**
 * Immutable 3-component vector used for positions, directions and RGB
 * radiance alike.
 */

import { DegenerateVectorError } from './errors.js'

/** Tolerance shared by equivalence tests, tangency gating and the bounce offset. */
export const EPSILON = 1e-5

export class Vector3 {
  constructor(
    public readonly x: number,
    public readonly y: number,
    public readonly z: number,
  ) {}

  static splat(value: number): Vector3 {
    return new Vector3(value, value, value)
  }

  static readonly ZERO = new Vector3(0, 0, 0)

  dot(rhs: Vector3): number {
    return this.x * rhs.x + this.y * rhs.y + this.z * rhs.z
  }

  cross(rhs: Vector3): Vector3 {
    return new Vector3(
      this.y * rhs.z - this.z * rhs.y,
      this.z * rhs.x - this.x * rhs.z,
      this.x * rhs.y - this.y * rhs.x,
    )
  }

  length(): number {
    return Math.sqrt(this.dot(this))
  }

  add(rhs: Vector3): Vector3 {
    return new Vector3(this.x + rhs.x, this.y + rhs.y, this.z + rhs.z)
  }

  sub(rhs: Vector3): Vector3 {
    return new Vector3(this.x - rhs.x, this.y - rhs.y, this.z - rhs.z)
  }

  /** Component-wise (Hadamard) product. */
  mul(rhs: Vector3): Vector3 {
    return new Vector3(this.x * rhs.x, this.y * rhs.y, this.z * rhs.z)
  }

  scale(s: number): Vector3 {
    return new Vector3(this.x * s, this.y * s, this.z * s)
  }

  addScalar(s: number): Vector3 {
    return new Vector3(this.x + s, this.y + s, this.z + s)
  }

  negate(): Vector3 {
    return new Vector3(-this.x, -this.y, -this.z)
  }

  /**
   * Unit vector in the same direction.
   *
   * @throws DegenerateVectorError when the length is zero or not finite
   */
  normalize(): Vector3 {
    const len = this.length()
    if (len === 0 || !Number.isFinite(len)) {
      throw new DegenerateVectorError(len)
    }
    return this.scale(1 / len)
  }

  distance(rhs: Vector3): number {
    return this.sub(rhs).length()
  }

  /** True when the Euclidean distance to `rhs` is strictly below `maxDelta`. */
  isEquivalent(rhs: Vector3, maxDelta: number = EPSILON): boolean {
    return rhs.sub(this).length() < maxDelta
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z]
  }

  static fromArray(v: readonly [number, number, number]): Vector3 {
    return new Vector3(v[0], v[1], v[2])
  }
}

/** Linear interpolation `a + (b - a) * t`. `t` is not clamped. */
export function lerp(a: Vector3, b: Vector3, t: number): Vector3 {
  return a.add(b.sub(a).scale(t))
}

/** Clamp to [0, 1]. */
export function saturate(value: number): number {
  return value < 0 ? 0 : value > 1 ? 1 : value
}
