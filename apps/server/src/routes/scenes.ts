import { Hono } from 'hono'
import { DEFAULT_CAMERA, buildDefaultScene } from '@spheretrace/path-tracer'
import { fromCameraConfig, fromScene } from '@spheretrace/shared'

const sceneRoutes = new Hono()

/** GET /scenes/default: the showcase scene as an editable render document */
sceneRoutes.get('/default', (c) =>
  c.json({
    scene: fromScene(buildDefaultScene()),
    camera: fromCameraConfig(DEFAULT_CAMERA),
  }),
)

export { sceneRoutes }
