import Conf from 'conf'
import { randomUUID } from 'crypto'
import type { Account, ConfigDocument, Game, Release, ReleaseState } from '@shared/types'
import { ConfigError, errorMessage } from './errors'

const defaults: ConfigDocument = {
  active_account_id: null,
  is_active: false,
  accounts: [],
}

export type ValidationResult = { ok: true } | { ok: false; reason: string }

/**
 * Owns the on-disk config document. Every mutation goes through `save`, which
 * rewrites the whole document; nothing writes individual fields.
 */
export class ConfigStore {
  private readonly conf: Conf<ConfigDocument>

  constructor(opts: { cwd: string; configName?: string }) {
    try {
      this.conf = new Conf<ConfigDocument>({
        cwd: opts.cwd,
        configName: opts.configName ?? 'config',
        defaults,
      })
    } catch (err) {
      throw new ConfigError('Unreadable', `Failed to open config: ${errorMessage(err)}`, { cause: err })
    }
  }

  get path(): string {
    return this.conf.path
  }

  get document(): ConfigDocument {
    // Older clients stored a single account at the top level.
    const raw: unknown = this.conf.store
    const migrated = migrateDocument(raw)
    if (migrated) {
      console.log(`[store] migrated legacy config at ${this.conf.path}`)
      this.conf.store = migrated
      return migrated
    }
    return this.conf.store
  }

  save(doc: ConfigDocument): ConfigDocument {
    const v = validateDocument(doc)
    if (!v.ok) throw new ConfigError('Invalid', `Refusing to save config: ${v.reason}`)
    this.conf.store = doc
    return doc
  }

  getActiveAccount(): Account | null {
    return getActiveAccount(this.document)
  }

  addAccount(params: { url: string; games_dir: string }): Account {
    const account: Account = {
      id: randomUUID(),
      games_dir: params.games_dir,
      url: stripTrailingSlash(params.url),
      username: '',
      session_token: null,
      games: [],
    }
    const doc = this.document
    this.save({ active_account_id: account.id, is_active: true, accounts: [...doc.accounts, account] })
    return account
  }

  setActiveAccount(id: string): ConfigDocument {
    const doc = this.document
    if (!doc.accounts.some((a) => a.id === id)) {
      throw new ConfigError('AccountNotFound', `No account with id ${id}`)
    }
    return this.save({ ...doc, active_account_id: id, is_active: true })
  }

  setActiveAccountByUrl(url: string): ConfigDocument {
    const wanted = stripTrailingSlash(url)
    const account = this.document.accounts.find((a) => a.url === wanted)
    if (!account) throw new ConfigError('AccountNotFound', `No account for ${wanted}`)
    return this.setActiveAccount(account.id)
  }
}

export function validateDocument(doc: ConfigDocument): ValidationResult {
  const ids = new Set<string>()
  for (const a of doc.accounts) {
    if (ids.has(a.id)) return { ok: false, reason: `duplicate account id ${a.id}` }
    ids.add(a.id)

    const names = new Set<string>()
    for (const g of a.games) {
      if (names.has(g.name_id)) return { ok: false, reason: `duplicate game ${g.name_id} in account ${a.id}` }
      names.add(g.name_id)

      const releases = new Set<string>()
      for (const r of g.releases) {
        const key = `${r.channel_name}/${r.version}`
        if (releases.has(key)) return { ok: false, reason: `duplicate release ${key} in game ${g.name_id}` }
        releases.add(key)
      }
    }
  }

  if (doc.is_active) {
    if (!doc.active_account_id) return { ok: false, reason: 'is_active set without active_account_id' }
    if (!ids.has(doc.active_account_id)) {
      return { ok: false, reason: `active account ${doc.active_account_id} does not exist` }
    }
  }
  return { ok: true }
}

export function getActiveAccount(doc: ConfigDocument): Account | null {
  if (!doc.is_active || !doc.active_account_id) return null
  return doc.accounts.find((a) => a.id === doc.active_account_id) ?? null
}

export function replaceAccount(doc: ConfigDocument, account: Account): ConfigDocument {
  const idx = doc.accounts.findIndex((a) => a.id === account.id)
  if (idx === -1) throw new ConfigError('AccountNotFound', `No account with id ${account.id}`)
  const accounts = [...doc.accounts]
  accounts[idx] = account
  return { ...doc, accounts }
}

export function setSessionCredentials(account: Account, username: string, sessionToken: string): Account {
  return { ...account, username, session_token: sessionToken }
}

export function clearSessionToken(account: Account): Account {
  return { ...account, session_token: null }
}

export function setReleaseState(
  account: Account,
  gameId: string,
  channel: string,
  version: string,
  state: ReleaseState
): Account {
  const game = account.games.find((g) => g.name_id === gameId)
  if (!game) throw new ConfigError('ReleaseNotFound', `Failed to find game with name_id: ${gameId}`)

  const idx = game.releases.findIndex((r) => r.version === version && r.channel_name === channel)
  if (idx === -1) throw new ConfigError('ReleaseNotFound', `Failed to find release ${version} ${channel}`)

  const releases = [...game.releases]
  releases[idx] = { ...releases[idx], state }
  return patchGame(account, { ...game, releases })
}

export function setSelectedChannel(account: Account, gameId: string, channel: string | null): Account {
  const game = account.games.find((g) => g.name_id === gameId)
  if (!game) throw new ConfigError('ReleaseNotFound', `Failed to find game with name_id: ${gameId}`)
  return patchGame(account, { ...game, selected_channel: channel })
}

function patchGame(account: Account, game: Game): Account {
  return { ...account, games: account.games.map((g) => (g.name_id === game.name_id ? game : g)) }
}

function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url
}

/**
 * Lifts the single-account layout (`games_dir`, `username`, `drops_url`,
 * `games` at the top level) into the account list. Returns null when the
 * document already has the current shape.
 */
export function migrateDocument(raw: unknown): ConfigDocument | null {
  if (!isRecord(raw)) return null
  if (Array.isArray(raw.accounts) && raw.accounts.length > 0) return null
  if (typeof raw.drops_url !== 'string') return null

  const account: Account = {
    id: randomUUID(),
    games_dir: typeof raw.games_dir === 'string' ? raw.games_dir : '',
    url: stripTrailingSlash(raw.drops_url),
    username: typeof raw.username === 'string' ? raw.username : '',
    session_token: null,
    games: Array.isArray(raw.games) ? raw.games.filter(isRecord).map(migrateGame) : [],
  }

  return { active_account_id: account.id, is_active: true, accounts: [account] }
}

function migrateGame(g: Record<string, unknown>): Game {
  return {
    name: str(g.name),
    name_id: str(g.name_id),
    description: str(g.description),
    author: str(g.author),
    orphaned: g.orphaned === true,
    selected_channel: typeof g.selected_channel === 'string' ? g.selected_channel : null,
    releases: Array.isArray(g.releases) ? g.releases.filter(isRecord).map(migrateRelease) : [],
  }
}

function migrateRelease(r: Record<string, unknown>): Release {
  return {
    channel_name: str(r.channel_name),
    version: str(r.version),
    description: str(r.description),
    state: r.state === 'Installed' ? 'Installed' : 'NotInstalled',
    release_date: str(r.release_date),
    executable_path: str(r.executable_path),
    size_bytes: typeof r.size_bytes === 'number' ? r.size_bytes : 0,
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function str(v: unknown): string {
  return typeof v === 'string' ? v : ''
}
