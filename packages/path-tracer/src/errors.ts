/**
 * Error types raised by the path tracer.
 *
 * Rendering is a pure function of its inputs: any of these aborts the
 * current frame and is never retried.
 */

/** `normalize` was called on a zero-length (or non-finite) vector. */
export class DegenerateVectorError extends Error {
  constructor(public readonly length: number) {
    super(`Cannot normalize a vector of length ${length}`)
    this.name = 'DegenerateVectorError'
  }
}

/** Camera position / target / up hint do not span a usable basis. */
export class DegenerateCameraBasisError extends Error {
  constructor(reason: string) {
    super(`Degenerate camera basis: ${reason}`)
    this.name = 'DegenerateCameraBasisError'
  }
}

/** Scene authoring mistake: non-positive radius, dangling material id, ... */
export class InvalidGeometryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidGeometryError'
  }
}

/** Internal post-condition failed. Only raised when debug invariants are enabled. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`)
    this.name = 'InvariantViolationError'
  }
}
