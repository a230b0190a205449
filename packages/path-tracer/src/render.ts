/**
 * Image sampler: one primary ray per pixel, `samplesPerPixel` independent
 * path estimates averaged, saturated and quantised to 8 bits.
 */

import type { CameraConfig } from './camera.js'
import { createCamera, primaryRay } from './camera.js'
import type { Scene } from './geometry.js'
import type { PixelSink, RGB8 } from './image.js'
import type { IntersectionMode } from './intersect.js'
import type { BackgroundMode, TraceOptions } from './integrator.js'
import { assertMaxBounces, tracePath } from './integrator.js'
import type { PixelRandomFactory, PRNG } from './random.js'
import { Vector3, saturate } from './vector3.js'

export interface RenderSettings {
  scene: Scene
  camera: CameraConfig
  width: number
  height: number
  samplesPerPixel: number
  maxBounces: number
  backgroundMode: BackgroundMode
  /** One stream for the whole frame, or a fresh stream per pixel */
  randomSource: PRNG | PixelRandomFactory
  debugInvariants?: boolean
  intersection?: IntersectionMode
}

export interface RenderStats {
  pixels: number
  samples: number
  elapsedMs: number
}

/** Saturate each channel and scale to [0, 255], truncating toward zero. */
export function toRGB8(radiance: Vector3): RGB8 {
  return [
    Math.trunc(saturate(radiance.x) * 255),
    Math.trunc(saturate(radiance.y) * 255),
    Math.trunc(saturate(radiance.z) * 255),
  ]
}

function streamFor(source: PRNG | PixelRandomFactory, x: number, y: number): PRNG {
  return typeof source === 'function' ? source(x, y) : source
}

/**
 * Render the whole frame into `sink`, column by column.
 *
 * Runs synchronously to completion. Errors (degenerate camera, invalid
 * settings) abort before any pixel is written.
 */
export function renderImage(settings: RenderSettings, sink: PixelSink): RenderStats {
  const { scene, width, height, samplesPerPixel } = settings
  if (!Number.isInteger(samplesPerPixel) || samplesPerPixel < 1) {
    throw new RangeError(`samplesPerPixel must be a positive integer, got ${samplesPerPixel}`)
  }
  assertMaxBounces(settings.maxBounces)

  const camera = createCamera(settings.camera, width, height)
  const start = performance.now()

  for (let i = 0; i < width; i++) {
    for (let j = 0; j < height; j++) {
      const ray = primaryRay(camera, i, j)
      const options: TraceOptions = {
        maxBounces: settings.maxBounces,
        backgroundMode: settings.backgroundMode,
        random: streamFor(settings.randomSource, i, j),
        debugInvariants: settings.debugInvariants,
        intersection: settings.intersection,
      }

      let sum = Vector3.ZERO
      for (let s = 0; s < samplesPerPixel; s++) {
        sum = sum.add(tracePath(ray, scene, 0, options))
      }

      sink.setPixel(i, j, toRGB8(sum.scale(1 / samplesPerPixel)))
    }
  }

  return {
    pixels: width * height,
    samples: width * height * samplesPerPixel,
    elapsedMs: performance.now() - start,
  }
}
