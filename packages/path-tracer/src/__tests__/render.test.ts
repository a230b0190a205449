import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { renderImage, toRGB8 } from '../render.js'
import type { RenderSettings } from '../render.js'
import { ImageBuffer } from '../image.js'
import type { PixelSink, RGB8 } from '../image.js'
import { createScene, createSphere } from '../geometry.js'
import { buildDefaultScene, DEFAULT_CAMERA } from '../scene-builder.js'
import { createPRNG, pixelStreams } from '../random.js'
import { DegenerateCameraBasisError } from '../errors.js'
import { createCamera, primaryRay } from '../camera.js'
import { background } from '../integrator.js'
import { Vector3 } from '../vector3.js'

// ─── Helpers ───────────────────────────────────────────────────────────────

/** A single emissive, non-reflective sphere enclosing the camera. */
function glowScene(emissive: [number, number, number]) {
  return createScene(
    [{ albedo: Vector3.ZERO, emissive: Vector3.fromArray(emissive), roughness: 1 }],
    [createSphere(Vector3.ZERO, 10, 0)],
  )
}

function settings(overrides: Partial<RenderSettings> = {}): RenderSettings {
  return {
    scene: glowScene([10, 10, 10]),
    camera: {
      position: new Vector3(0, 0, -1),
      lookAtTarget: Vector3.ZERO,
      upHint: new Vector3(0, 1, 0),
    },
    width: 4,
    height: 3,
    samplesPerPixel: 3,
    maxBounces: 6,
    backgroundMode: 'black',
    randomSource: createPRNG(1),
    debugInvariants: true,
    ...overrides,
  }
}

class RecordingSink implements PixelSink {
  readonly calls: Array<{ x: number; y: number; color: RGB8 }> = []
  setPixel(x: number, y: number, color: RGB8): void {
    this.calls.push({ x, y, color })
  }
}

// ─── Tone mapping ──────────────────────────────────────────────────────────

describe('toRGB8', () => {
  it('saturates and truncates each channel', () => {
    expect(toRGB8(new Vector3(0.5, 1.5, -2))).toEqual([127, 255, 0])
  })

  it('always lands in [0, 255]', () => {
    fc.assert(
      fc.property(fc.double({ noNaN: true }), fc.double({ noNaN: true }), fc.double({ noNaN: true }), (r, g, b) => {
        for (const channel of toRGB8(new Vector3(r, g, b))) {
          expect(Number.isInteger(channel)).toBe(true)
          expect(channel).toBeGreaterThanOrEqual(0)
          expect(channel).toBeLessThanOrEqual(255)
        }
      }),
    )
  })
})

// ─── Image sampler ─────────────────────────────────────────────────────────

describe('renderImage', () => {
  it('clamps an over-bright emissive sphere filling the view to white', () => {
    const image = new ImageBuffer(4, 3)
    renderImage(settings(), image)
    for (let x = 0; x < 4; x++) {
      for (let y = 0; y < 3; y++) {
        expect(image.getPixel(x, y)).toEqual([255, 255, 255])
      }
    }
  })

  it('converges to the emissive color of a zero-albedo sphere', () => {
    const image = new ImageBuffer(4, 3)
    renderImage(settings({ scene: glowScene([0.5, 0.25, 1]), samplesPerPixel: 4 }), image)
    expect(image.getPixel(0, 0)).toEqual([127, 63, 255])
    expect(image.getPixel(3, 2)).toEqual([127, 63, 255])
  })

  it('visits every pixel once, column by column', () => {
    const sink = new RecordingSink()
    renderImage(settings({ width: 2, height: 3 }), sink)
    expect(sink.calls.map(({ x, y }) => [x, y])).toEqual([
      [0, 0], [0, 1], [0, 2],
      [1, 0], [1, 1], [1, 2],
    ])
  })

  it('reports pixel and sample counts', () => {
    const stats = renderImage(settings({ width: 5, height: 2, samplesPerPixel: 7 }), new ImageBuffer(5, 2))
    expect(stats.pixels).toBe(10)
    expect(stats.samples).toBe(70)
    expect(stats.elapsedMs).toBeGreaterThanOrEqual(0)
  })

  it('renders an empty scene as pure black background', () => {
    const image = new ImageBuffer(4, 3)
    renderImage(settings({ scene: createScene([], []) }), image)
    expect(Array.from(image.data).every((v) => v === 0)).toBe(true)
  })

  it('renders an empty scene as the sky gradient', () => {
    const config = settings({ scene: createScene([], []), backgroundMode: 'skyGradient', samplesPerPixel: 1 })
    const image = new ImageBuffer(4, 3)
    renderImage(config, image)

    const camera = createCamera(config.camera, 4, 3)
    for (let x = 0; x < 4; x++) {
      for (let y = 0; y < 3; y++) {
        const expected = toRGB8(background(primaryRay(camera, x, y), 'skyGradient'))
        expect(image.getPixel(x, y)).toEqual(expected)
      }
    }
    // Rays above the horizon pick up blue, rays below it stay black.
    expect(image.getPixel(0, 0)[2]).toBeGreaterThan(0)
    expect(image.getPixel(0, 2)).toEqual([0, 0, 0])
  })

  it('is reproducible with per-pixel streams', () => {
    const base = settings({ scene: buildDefaultScene(), camera: DEFAULT_CAMERA, width: 6, height: 4, samplesPerPixel: 2 })
    const a = new ImageBuffer(6, 4)
    const b = new ImageBuffer(6, 4)
    renderImage({ ...base, randomSource: pixelStreams(42) }, a)
    renderImage({ ...base, randomSource: pixelStreams(42) }, b)
    expect(b.data).toEqual(a.data)
  })

  it('is reproducible with a single seeded stream', () => {
    const base = settings({ scene: buildDefaultScene(), camera: DEFAULT_CAMERA, width: 6, height: 4, samplesPerPixel: 2 })
    const a = new ImageBuffer(6, 4)
    const b = new ImageBuffer(6, 4)
    renderImage({ ...base, randomSource: createPRNG(7) }, a)
    renderImage({ ...base, randomSource: createPRNG(7) }, b)
    expect(b.data).toEqual(a.data)
  })

  it('rejects invalid sample and bounce counts', () => {
    expect(() => renderImage(settings({ samplesPerPixel: 0 }), new RecordingSink())).toThrow(RangeError)
    expect(() => renderImage(settings({ maxBounces: 0 }), new RecordingSink())).toThrow(RangeError)
    expect(() => renderImage(settings({ maxBounces: 1.5 }), new RecordingSink())).toThrow(RangeError)
    expect(() => renderImage(settings({ maxBounces: 65 }), new RecordingSink())).toThrow(RangeError)
  })

  it('fails before writing any pixel when the camera basis is degenerate', () => {
    const sink = new RecordingSink()
    const camera = { position: new Vector3(0, 0, -1), lookAtTarget: Vector3.ZERO, upHint: new Vector3(0, 0, 1) }
    expect(() => renderImage(settings({ camera }), sink)).toThrow(DegenerateCameraBasisError)
    expect(sink.calls).toHaveLength(0)
  })
})
