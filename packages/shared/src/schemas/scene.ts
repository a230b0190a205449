import { z } from 'zod'

/** [x, y, z] or [r, g, b] */
export const vec3Schema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()])

export const materialSchema = z.object({
  albedo: vec3Schema,
  emissive: vec3Schema,
  roughness: z.number().finite().default(1),
})

export const sphereSchema = z.object({
  center: vec3Schema,
  radius: z.number().finite().positive('Radius must be greater than 0'),
  materialRef: z.number().int().min(0),
})

export const sceneSchema = z
  .object({
    materials: z.array(materialSchema).max(256),
    spheres: z.array(sphereSchema).max(1024),
  })
  .superRefine((scene, ctx) => {
    scene.spheres.forEach((sphere, index) => {
      if (sphere.materialRef >= scene.materials.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['spheres', index, 'materialRef'],
          message: `Material ${sphere.materialRef} does not exist`,
        })
      }
    })
  })

export const cameraSchema = z.object({
  position: vec3Schema,
  lookAtTarget: vec3Schema,
  upHint: vec3Schema.default([0, 1, 0]),
})

export type Vec3Input = z.infer<typeof vec3Schema>
export type MaterialInput = z.infer<typeof materialSchema>
export type SphereInput = z.infer<typeof sphereSchema>
export type SceneInput = z.infer<typeof sceneSchema>
export type CameraInput = z.infer<typeof cameraSchema>
