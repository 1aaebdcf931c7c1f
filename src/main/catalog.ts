import { request, type Dispatcher } from 'undici'
import type { Account, CatalogResponse, PlatformId, RemoteGame, RemoteRelease } from '@shared/types'
import { CatalogError, LoginError, errorMessage } from './errors'

export type CatalogClientOptions = {
  platform: PlatformId
  timeoutMs: number
  /** Alternate undici dispatcher; tests pass a MockAgent. */
  dispatcher?: Dispatcher
}

type ShapeCheck = { ok: true } | { ok: false; reason: string }

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

function checkRelease(r: unknown): ShapeCheck {
  if (!isObject(r)) return { ok: false, reason: 'release is not an object' }
  for (const key of ['channel', 'version', 'release_date', 'executable_path'] as const) {
    if (typeof r[key] !== 'string') return { ok: false, reason: `release.${key} is not a string` }
  }
  if (typeof r.size_bytes !== 'number') return { ok: false, reason: 'release.size_bytes is not a number' }
  return { ok: true }
}

function checkGame(g: unknown): ShapeCheck {
  if (!isObject(g)) return { ok: false, reason: 'game is not an object' }
  if (typeof g.name_id !== 'string' || !g.name_id) return { ok: false, reason: 'game.name_id is missing' }
  if (typeof g.name !== 'string') return { ok: false, reason: `game ${g.name_id}: name is not a string` }
  if (!Array.isArray(g.releases)) return { ok: false, reason: `game ${g.name_id}: releases is not an array` }
  for (const r of g.releases) {
    const v = checkRelease(r)
    if (!v.ok) return { ok: false, reason: `game ${g.name_id}: ${v.reason}` }
  }
  return { ok: true }
}

function toRelease(r: Record<string, unknown>): RemoteRelease {
  return {
    channel: String(r.channel),
    version: String(r.version),
    description: typeof r.description === 'string' ? r.description : '',
    release_date: String(r.release_date),
    executable_path: String(r.executable_path),
    size_bytes: Number(r.size_bytes),
  }
}

function toGame(g: Record<string, unknown>): RemoteGame {
  const releases = Array.isArray(g.releases) ? g.releases.filter(isObject).map(toRelease) : []
  return {
    name: String(g.name),
    name_id: String(g.name_id),
    description: typeof g.description === 'string' ? g.description : '',
    author: typeof g.author === 'string' ? g.author : '',
    default_channel: typeof g.default_channel === 'string' ? g.default_channel : null,
    releases,
  }
}

export function parseCatalog(json: unknown): CatalogResponse {
  if (!isObject(json) || !Array.isArray(json.games)) {
    throw new CatalogError('InvalidResponse', 'catalog response has no games array')
  }
  for (const g of json.games) {
    const v = checkGame(g)
    if (!v.ok) throw new CatalogError('InvalidResponse', `invalid catalog: ${v.reason}`)
  }
  return { games: json.games.filter(isObject).map(toGame) }
}

/** Picks the `id=...` pair out of one or more set-cookie headers. */
export function parseSessionCookie(header: string | string[] | undefined): string | null {
  const values = Array.isArray(header) ? header : header ? [header] : []
  for (const value of values) {
    const part = value.split(';').find((p) => p.trim().startsWith('id='))
    if (part && part.trim().length > 'id='.length) return part.trim()
  }
  return null
}

export function joinUrl(base: string, path: string): string {
  const b = base.endsWith('/') ? base.slice(0, -1) : base
  const p = path.startsWith('/') ? path.slice(1) : path
  return `${b}/${p}`
}

export class CatalogClient {
  constructor(private readonly opts: CatalogClientOptions) {}

  private async send(url: string, init: { method: 'GET' | 'POST'; headers?: Record<string, string> }) {
    const controller = new AbortController()
    const t = setTimeout(() => controller.abort(), this.opts.timeoutMs)
    try {
      return await request(url, {
        method: init.method,
        headers: init.headers,
        signal: controller.signal,
        dispatcher: this.opts.dispatcher,
      })
    } finally {
      clearTimeout(t)
    }
  }

  async login(baseUrl: string, username: string, password: string): Promise<string> {
    const url = joinUrl(baseUrl, 'login')
    const basic = Buffer.from(`${username}:${password}`).toString('base64')

    let res: Dispatcher.ResponseData
    try {
      res = await this.send(url, { method: 'POST', headers: { authorization: `Basic ${basic}` } })
    } catch (err) {
      throw new LoginError('Unreachable', `Could not reach ${url}: ${errorMessage(err)}`, { cause: err })
    }
    await res.body.dump()

    if (res.statusCode === 401) throw new LoginError('BadCredentials', 'Bad username or password')
    if (res.statusCode === 404) throw new LoginError('NotFound', `Login endpoint not found at ${url}`)
    if (res.statusCode !== 200) throw new LoginError('ApiError', `Login failed: HTTP ${res.statusCode}`)

    const token = parseSessionCookie(res.headers['set-cookie'])
    if (!token) throw new LoginError('ApiError', 'Login response did not set a session cookie')

    console.log(`[catalog] logged in as ${username} at ${baseUrl}`)
    return token
  }

  async fetchCatalog(account: Account): Promise<CatalogResponse> {
    const url = `${joinUrl(account.url, 'games')}?platform=${encodeURIComponent(this.opts.platform)}`
    const headers: Record<string, string> = { accept: 'application/json' }
    if (account.session_token) headers.cookie = account.session_token

    let res: Dispatcher.ResponseData
    try {
      res = await this.send(url, { method: 'GET', headers })
    } catch (err) {
      throw new CatalogError('Unreachable', `Could not reach ${url}: ${errorMessage(err)}`, { cause: err })
    }

    // Redirects are how the server says the session is gone.
    if ((res.statusCode >= 300 && res.statusCode < 400) || res.statusCode === 401) {
      await res.body.dump()
      throw new CatalogError('NeedsRelogin', `Catalog request answered HTTP ${res.statusCode}; session expired`)
    }
    if (res.statusCode === 404) {
      await res.body.dump()
      throw new CatalogError('NotFound', `Catalog not found at ${url}`)
    }
    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump()
      throw new CatalogError('ApiError', `Catalog fetch failed: HTTP ${res.statusCode}`)
    }

    const contentType = String(res.headers['content-type'] ?? '')
    if (!contentType.toLowerCase().includes('application/json')) {
      const preview = await res.body.text()
      const head = preview.trimStart().slice(0, 64).toLowerCase()
      if (head.startsWith('<!doctype') || head.startsWith('<html')) {
        throw new CatalogError('InvalidResponse', 'Catalog URL returned HTML instead of JSON')
      }
      throw new CatalogError('InvalidResponse', `expected application/json but got ${contentType || '(missing content-type)'}`)
    }

    let json: unknown
    try {
      json = await res.body.json()
    } catch (err) {
      throw new CatalogError('InvalidResponse', `Catalog body is not valid JSON: ${errorMessage(err)}`, { cause: err })
    }

    const catalog = parseCatalog(json)
    console.log(`[catalog] ${catalog.games.length} game(s) from ${account.url}`)
    return catalog
  }

  async canReachHost(url: string): Promise<boolean> {
    try {
      const res = await this.send(url, { method: 'GET' })
      await res.body.dump()
      return true
    } catch {
      return false
    }
  }
}
