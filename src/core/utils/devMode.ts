const DEV_MODE_FLAG = 'EFFECT_STORE_DEV_MODE'

/**
 * Checks if the process is running in development mode
 *
 * @remarks
 * True when `NODE_ENV` is `development`, or when `EFFECT_STORE_DEV_MODE` is set to
 * `true` or `1`. Safe to call where `process` is not defined.
 */
export function isDevMode(): boolean {
  if (typeof process === 'undefined' || !process.env) return false

  const flag = process.env[DEV_MODE_FLAG]?.toLowerCase()
  return process.env.NODE_ENV === 'development' || flag === 'true' || flag === '1'
}
