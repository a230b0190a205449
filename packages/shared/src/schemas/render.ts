import { z } from 'zod'
import { MAX_BOUNCES } from '@spheretrace/path-tracer'
import { cameraSchema, sceneSchema } from './scene.js'

export const MAX_IMAGE_SIZE = 512
export const MAX_SAMPLES_PER_PIXEL = 4096

/** 32-bit seed range; `pixelSeed` folds anything wider onto it. */
export const MIN_SEED = -0x80000000
export const MAX_SEED = 0x7fffffff

export const imageSchema = z.object({
  width: z.number().int().min(1).max(MAX_IMAGE_SIZE),
  height: z.number().int().min(1).max(MAX_IMAGE_SIZE),
})

/** POST /render body. Omitted scene/camera fall back to the showcase scene. */
export const renderRequestSchema = z.object({
  scene: sceneSchema.optional(),
  camera: cameraSchema.optional(),
  image: imageSchema,
  samplesPerPixel: z.number().int().min(1).max(MAX_SAMPLES_PER_PIXEL).optional(),
  maxBounces: z.number().int().min(1).max(MAX_BOUNCES).optional(),
  backgroundMode: z.enum(['black', 'skyGradient']).optional(),
  seed: z.number().int().min(MIN_SEED).max(MAX_SEED).optional(),
})

export { MAX_BOUNCES }

export type ImageInput = z.infer<typeof imageSchema>
export type RenderRequestInput = z.infer<typeof renderRequestSchema>
