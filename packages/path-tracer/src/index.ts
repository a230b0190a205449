/**
 * @spheretrace/path-tracer
 *
 * Recursive Monte Carlo path tracer over an analytic sphere scene.
 *
 * Vector algebra, ray/material/sphere types, ray-sphere intersection,
 * tangent frames, uniform hemisphere sampling, the radiance estimator,
 * scene authoring and the camera / image sampler.
 */

export { Vector3, EPSILON, lerp, saturate } from './vector3.js'

export {
  DegenerateVectorError,
  DegenerateCameraBasisError,
  InvalidGeometryError,
  InvariantViolationError,
} from './errors.js'

export { createSphere, createScene, materialOf } from './geometry.js'
export type { Ray, Material, Sphere, Scene } from './geometry.js'

export { intersect, intersectInto, createHitBuffer } from './intersect.js'
export type { HitBuffer, IntersectionMode } from './intersect.js'

export { buildTangentFrame } from './tangent-frame.js'
export type { TangentFrame } from './tangent-frame.js'

export { sampleHemisphere } from './hemisphere.js'

export { createPRNG, mathRandom, pixelSeed, pixelStreams } from './random.js'
export type { PRNG, PixelRandomFactory } from './random.js'

export {
  tracePath,
  findNearestHit,
  background,
  assertMaxBounces,
  BACKGROUND_MODES,
  SKY_COLOR,
  DEFAULT_MAX_BOUNCES,
  MAX_BOUNCES,
} from './integrator.js'
export type { BackgroundMode, TraceOptions, Hit } from './integrator.js'

export { SceneBuilder, buildDefaultScene, DEFAULT_CAMERA } from './scene-builder.js'

export { createCamera, primaryRay, assertImageSize } from './camera.js'
export type { Camera, CameraConfig } from './camera.js'

export { renderImage, toRGB8 } from './render.js'
export type { RenderSettings, RenderStats } from './render.js'

export { ImageBuffer, encodePPM } from './image.js'
export type { PixelSink, RGB8 } from './image.js'
