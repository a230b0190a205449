// Shared configuration: render defaults and their environment overrides.

export {
  renderConfig,
  resolveRenderConfig,
  DEFAULT_RENDER_CONFIG,
  ENV_KEYS,
  type RenderConfig,
  type RenderConfigKey,
} from './render-config.js'
