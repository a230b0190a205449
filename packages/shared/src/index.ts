export * from './schemas/index.js'
export { toScene, toCameraConfig, fromScene, fromCameraConfig } from './convert.js'
