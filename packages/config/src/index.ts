// Runtime configuration shared with the browser bundle: feature flags.
// Build-time configuration (project descriptor, compiler, bundler) lives in ./build
// so that zod and vite types stay out of the client bundle.

export {
  resolveFlags,
  readEnvFlag,
  DEFAULT_FLAGS,
  DEMO_FLAG_KEYS,
  ENV_PREFIX,
  type DemoFlags,
  type DemoFlagKey,
  type EnvRecord,
} from './flags'
