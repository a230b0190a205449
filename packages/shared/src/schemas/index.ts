export {
  vec3Schema,
  materialSchema,
  sphereSchema,
  sceneSchema,
  cameraSchema,
  type Vec3Input,
  type MaterialInput,
  type SphereInput,
  type SceneInput,
  type CameraInput,
} from './scene.js'

export {
  imageSchema,
  renderRequestSchema,
  MAX_IMAGE_SIZE,
  MAX_SAMPLES_PER_PIXEL,
  MAX_BOUNCES,
  MIN_SEED,
  MAX_SEED,
  type ImageInput,
  type RenderRequestInput,
} from './render.js'
