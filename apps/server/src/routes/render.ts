import { Hono } from 'hono'
import {
  DegenerateCameraBasisError,
  DEFAULT_CAMERA,
  ImageBuffer,
  InvalidGeometryError,
  buildDefaultScene,
  encodePPM,
  mathRandom,
  pixelStreams,
  renderImage,
} from '@spheretrace/path-tracer'
import { renderConfig } from '@spheretrace/config'
import { renderRequestSchema, toCameraConfig, toScene } from '@spheretrace/shared'
import { parseBody, isResponse } from '../lib/validate.js'

const renderRoutes = new Hono()

/**
 * POST /render: path trace a scene and return it as a binary PPM.
 *
 * Omitted scene/camera use the showcase scene; omitted render settings use
 * the process render config. A `seed` makes the image reproducible.
 */
renderRoutes.post('/', async (c) => {
  const data = await parseBody(c, renderRequestSchema)
  if (isResponse(data)) return data

  const { width, height } = data.image
  const image = new ImageBuffer(width, height)
  const samplesPerPixel = data.samplesPerPixel ?? renderConfig.samplesPerPixel

  try {
    const stats = renderImage(
      {
        scene: data.scene ? toScene(data.scene) : buildDefaultScene(),
        camera: data.camera ? toCameraConfig(data.camera) : DEFAULT_CAMERA,
        width,
        height,
        samplesPerPixel,
        maxBounces: data.maxBounces ?? renderConfig.maxBounces,
        backgroundMode: data.backgroundMode ?? renderConfig.backgroundMode,
        randomSource: data.seed === undefined ? mathRandom : pixelStreams(data.seed),
        debugInvariants: renderConfig.debugInvariants,
        intersection: renderConfig.intersection,
      },
      image,
    )

    process.stdout.write(JSON.stringify({
      ts: new Date().toISOString(),
      level: 'info',
      event: 'render_completed',
      width,
      height,
      samples: stats.samples,
      ms: Number(stats.elapsedMs.toFixed(1)),
    }) + '\n')

    const ppm = encodePPM(image)
    const body = new ArrayBuffer(ppm.length)
    new Uint8Array(body).set(ppm)

    return c.body(body, 200, {
      'Content-Type': 'image/x-portable-pixmap',
      'X-Render-Samples': String(stats.samples),
      'X-Render-Ms': stats.elapsedMs.toFixed(1),
    })
  } catch (err) {
    if (err instanceof DegenerateCameraBasisError || err instanceof InvalidGeometryError) {
      return c.json({ error: err.message }, 422)
    }
    throw err
  }
})

export { renderRoutes }
