import { join } from 'path'
import fse from 'fs-extra'
import type { PlatformId } from '@shared/types'
import { detectPlatform, getDefaultConfigDir, getLockFilePath, SETTINGS_FILE_NAME } from './paths'

export const DEFAULT_CATALOG_POLL_INTERVAL_MS = 5 * 60_000
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000

export type OverrideConfig = {
  catalogPollIntervalMs?: number
  requestTimeoutMs?: number
  platform?: PlatformId
}

export type ResolvedConfig = {
  configDir: string
  lockPath: string
  catalogPollIntervalMs: number
  requestTimeoutMs: number
  platform: PlatformId
  overridePathTried: string
}

export async function initConfig(env: NodeJS.ProcessEnv = process.env): Promise<ResolvedConfig> {
  const configDir = env.LIBRARY_CLIENT_CONFIG_DIR?.trim() || getDefaultConfigDir()
  const overridePath = join(configDir, SETTINGS_FILE_NAME)

  const base: ResolvedConfig = {
    configDir,
    lockPath: getLockFilePath(configDir),
    catalogPollIntervalMs: DEFAULT_CATALOG_POLL_INTERVAL_MS,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    platform: detectPlatform(),
    overridePathTried: overridePath,
  }

  try {
    if (await fse.pathExists(overridePath)) {
      const json: unknown = await fse.readJson(overridePath)
      Object.assign(base, readOverride(json))
    }
  } catch (err) {
    console.warn(`[config] ignoring unreadable ${overridePath}: ${err instanceof Error ? err.message : String(err)}`)
  }

  const pollMs = parsePositiveInt(env.LIBRARY_CLIENT_POLL_INTERVAL_MS)
  if (pollMs) base.catalogPollIntervalMs = pollMs

  const timeoutMs = parsePositiveInt(env.LIBRARY_CLIENT_REQUEST_TIMEOUT_MS)
  if (timeoutMs) base.requestTimeoutMs = timeoutMs

  const platform = env.LIBRARY_CLIENT_PLATFORM
  if (isPlatformId(platform)) base.platform = platform

  return base
}

export function readOverride(json: unknown): OverrideConfig {
  const out: OverrideConfig = {}
  if (!json || typeof json !== 'object') return out

  if ('catalogPollIntervalMs' in json && isPositiveInt(json.catalogPollIntervalMs)) {
    out.catalogPollIntervalMs = json.catalogPollIntervalMs
  }
  if ('requestTimeoutMs' in json && isPositiveInt(json.requestTimeoutMs)) {
    out.requestTimeoutMs = json.requestTimeoutMs
  }
  if ('platform' in json && isPlatformId(json.platform)) {
    out.platform = json.platform
  }
  return out
}

function isPositiveInt(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v > 0
}

function parsePositiveInt(v: string | undefined): number | null {
  if (!v) return null
  const n = Number(v)
  return isPositiveInt(n) ? n : null
}

function isPlatformId(v: unknown): v is PlatformId {
  return v === 'windows' || v === 'linux' || v === 'mac'
}
