/**
 * Runtime configuration for the gate process, from the environment.
 */

export interface GateConfig {
  apiUrl: string
  /** Bus endpoint for gate commands */
  wsUrl: string
  gateApiKey?: string
  /** How long a barrier stays open before it is closed again */
  dwellMs: number
  /** Repeat reads of the same plate inside this window are ignored */
  cooldownMs: number
  reconnectMs: number
  /** Plate format hint for OCR text (ISO 3166-1 alpha-2) */
  countryCode?: string
  /** Serial device the barrier controller listens on; log-only when unset */
  device?: string
}

type Env = Record<string, string | undefined>

function readInt(env: Env, key: string, fallback: number): number {
  const value = parseInt(env[key] ?? '', 10)
  return !isNaN(value) && value >= 0 ? value : fallback
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function loadConfig(env: Env = process.env): GateConfig {
  const apiUrl = (readString(env, 'API_URL') ?? 'http://localhost:5000').replace(/\/+$/, '')
  return {
    apiUrl,
    wsUrl: readString(env, 'WS_URL') ?? `${apiUrl.replace(/^http/, 'ws')}/ws/gate`,
    gateApiKey: readString(env, 'GATE_API_KEY'),
    dwellMs: readInt(env, 'GATE_DWELL_MS', 3000),
    cooldownMs: readInt(env, 'DETECTION_COOLDOWN_MS', 5000),
    reconnectMs: readInt(env, 'WS_RECONNECT_MS', 5000),
    countryCode: readString(env, 'PLATE_COUNTRY'),
    device: readString(env, 'GATE_DEVICE'),
  }
}
