import { ConfigError } from './errors'

/**
 * Limits and switches applied by the converter before a request is encoded
 */
export interface ConverterConfig {
  /** Upper bound on the serialized generic request, in bytes */
  maxRequestSize: number
  maxMessages: number
  /** Upper bound on declared tools */
  maxTools: number
  /** Upper bound on a single message's text, in UTF-8 bytes */
  maxMessageSize: number
  validateSchemas: boolean
  /** Reject tool_use blocks naming a tool the request does not declare */
  strictMode: boolean
}

export const DEFAULT_CONVERTER_CONFIG: Readonly<ConverterConfig> = Object.freeze({
  maxRequestSize: 10 * 1024 * 1024,
  maxMessages: 100,
  maxTools: 50,
  maxMessageSize: 1024 * 1024,
  validateSchemas: true,
  strictMode: false,
})

const NUMERIC_KEYS = ['maxRequestSize', 'maxMessages', 'maxTools', 'maxMessageSize'] as const

/**
 * Merge overrides onto the defaults, rejecting limits that are not positive integers
 */
export function resolveConverterConfig(overrides: Partial<ConverterConfig> = {}): ConverterConfig {
  const config: ConverterConfig = { ...DEFAULT_CONVERTER_CONFIG, ...overrides }

  for (const key of NUMERIC_KEYS) {
    const value = config[key]
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${key} must be a positive integer, got: ${value}`)
    }
  }

  return config
}

const ENV_NUMBERS: Record<(typeof NUMERIC_KEYS)[number], string> = {
  maxRequestSize: 'WIREBRIDGE_MAX_REQUEST_SIZE',
  maxMessages: 'WIREBRIDGE_MAX_MESSAGES',
  maxTools: 'WIREBRIDGE_MAX_TOOLS',
  maxMessageSize: 'WIREBRIDGE_MAX_MESSAGE_SIZE',
}

/**
 * Read converter settings from environment variables
 */
export function converterConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ConverterConfig {
  const overrides: Partial<ConverterConfig> = {}

  for (const key of NUMERIC_KEYS) {
    const raw = env[ENV_NUMBERS[key]]
    if (raw === undefined || raw === '') continue
    const value = Number(raw)
    if (Number.isNaN(value)) {
      throw new ConfigError(`${ENV_NUMBERS[key]} must be a number, got: ${raw}`)
    }
    overrides[key] = value
  }

  const validateSchemas = parseBoolean(env, 'WIREBRIDGE_VALIDATE_SCHEMAS')
  if (validateSchemas !== undefined) overrides.validateSchemas = validateSchemas

  const strictMode = parseBoolean(env, 'WIREBRIDGE_STRICT_MODE')
  if (strictMode !== undefined) overrides.strictMode = strictMode

  return resolveConverterConfig(overrides)
}

function parseBoolean(env: Record<string, string | undefined>, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return undefined
  if (raw === 'true' || raw === '1') return true
  if (raw === 'false' || raw === '0') return false
  throw new ConfigError(`${name} must be true or false, got: ${env[name]}`)
}
