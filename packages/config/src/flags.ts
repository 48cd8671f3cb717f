/** Runtime feature flags for the demo. */
export interface DemoFlags {
  ENABLE_ANTIALIAS: boolean
  ENABLE_CAMERA_CONTROLS: boolean
}

export type DemoFlagKey = keyof DemoFlags

/** All flag keys for iteration. */
export const DEMO_FLAG_KEYS: DemoFlagKey[] = ['ENABLE_ANTIALIAS', 'ENABLE_CAMERA_CONTROLS']

export const DEFAULT_FLAGS: DemoFlags = {
  ENABLE_ANTIALIAS: true,
  ENABLE_CAMERA_CONTROLS: true,
}

/** Prefix Vite exposes to client code. */
export const ENV_PREFIX = 'VITE_'

export type EnvRecord = Readonly<Record<string, string | boolean | undefined>>

/** `true`/`1` and `false`/`0` are recognised; anything else is unset. */
export function readEnvFlag(env: EnvRecord, key: string): boolean | undefined {
  const val = env[key]
  if (typeof val === 'boolean') return val
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

/** Resolve every flag: env override > default. */
export function resolveFlags(env: EnvRecord): DemoFlags {
  const flags = { ...DEFAULT_FLAGS }
  for (const key of DEMO_FLAG_KEYS) {
    flags[key] = readEnvFlag(env, `${ENV_PREFIX}${key}`) ?? DEFAULT_FLAGS[key]
  }
  return flags
}
