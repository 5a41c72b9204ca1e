export {
  ConfigValidationError,
  DEFAULT_ACTIVE_AGENTS,
  DEFAULT_ROSTER,
  engineConfigOverridesSchema,
  engineConfigSchema,
  loadEngineConfig,
} from './engine-config'
export type { CycleDurations, EngineConfig, EngineConfigOverrides } from './engine-config'
