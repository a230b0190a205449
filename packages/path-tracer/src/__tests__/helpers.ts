import { expect } from 'vitest'
import type { Vector3 } from '../vector3.js'

/** Per-component closeness; also treats -0 and 0 as equal. */
export function expectVec(actual: Vector3, expected: readonly [number, number, number], digits = 12): void {
  expect(actual.x).toBeCloseTo(expected[0], digits)
  expect(actual.y).toBeCloseTo(expected[1], digits)
  expect(actual.z).toBeCloseTo(expected[2], digits)
}
