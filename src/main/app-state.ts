import type {
  Account,
  CatalogResponse,
  ConfigDocument,
  DownloadRequest,
  InstalledRelease,
  InstallProgressEvent,
  Release,
} from '@shared/types'
import {
  CatalogError,
  ConfigError,
  DownloadError,
  LoginError,
  ReconcileError,
  describeDownloadError,
  type DownloadErrorKind,
} from './errors'
import { newestRelease, resolveLaunch, type LaunchResolution } from './launcher'
import { reconcileCatalog } from './reconcile'
import {
  clearSessionToken,
  getActiveAccount,
  replaceAccount,
  setReleaseState,
  setSelectedChannel,
  setSessionCredentials,
} from './store'

export type Screen = 'wizard' | 'login' | 'main'

export type DownloadStatus =
  | { kind: 'downloading'; percent: number }
  | { kind: 'errored'; error: { kind: DownloadErrorKind; message: string } }

export type DownloadTask = {
  gameId: string
  accountId: string
  channel: string
  version: string
  sizeBytes: number
  status: DownloadStatus
}

export type LaunchIssue = Exclude<LaunchResolution, { kind: 'play' }>

export type AppState = {
  doc: ConfigDocument
  screen: Screen
  /** At most one task per game id. */
  downloads: Record<string, DownloadTask>
  /** Game asked for before the first sync finished. */
  requestedGame: string | null
  launchIssue: LaunchIssue | null
  loginError: string | null
  /** Set once the first sync attempt has completed, successfully or not. */
  synced: boolean
}

type EventMap = {
  'sync-requested': {}
  'catalog-fetched': { accountId: string; catalog: CatalogResponse }
  'catalog-failed': { accountId: string; error: CatalogError }
  'login-succeeded': { accountId: string; username: string; token: string }
  'login-failed': { error: LoginError }
  'install-requested': { gameId: string; channel?: string; version?: string }
  'download-progress': { event: InstallProgressEvent }
  'download-finished': { release: InstalledRelease }
  'download-failed': { gameId: string; error: DownloadError }
  'download-dismissed': { gameId: string }
  'download-cancel-requested': { gameId: string }
  'game-requested': { gameId: string }
  'channel-selected': { gameId: string; channel: string }
  'launch-issue-cleared': {}
  logout: {}
  'persist-failed': { restored: ConfigDocument; message: string }
}

export type AppEventType = keyof EventMap
export type AppEvent<K extends AppEventType = AppEventType> = { [P in K]: { type: P } & EventMap[P] }[K]

export type Effect =
  | { type: 'persist'; doc: ConfigDocument }
  | { type: 'fetch-catalog'; account: Account }
  | { type: 'start-download'; request: DownloadRequest }
  | { type: 'cancel-download'; gameId: string }
  | { type: 'launch'; gamesDir: string; gameId: string; release: Release }
  | { type: 'log'; level: 'info' | 'warn' | 'error'; message: string }

export type Transition = { state: AppState; effects: Effect[] }

const log = (level: 'info' | 'warn' | 'error', message: string): Effect => ({ type: 'log', level, message })
const unchanged = (state: AppState, ...effects: Effect[]): Transition => ({ state, effects })

function screenFor(doc: ConfigDocument): Screen {
  const account = getActiveAccount(doc)
  return !account ? 'wizard' : account.session_token ? 'main' : 'login'
}

export function initialState(doc: ConfigDocument): AppState {
  return {
    doc,
    screen: screenFor(doc),
    downloads: {},
    requestedGame: null,
    launchIssue: null,
    loginError: null,
    synced: false,
  }
}

function withoutTask(downloads: Record<string, DownloadTask>, gameId: string): Record<string, DownloadTask> {
  const next = { ...downloads }
  delete next[gameId]
  return next
}

function findAccount(doc: ConfigDocument, id: string): Account | null {
  return doc.accounts.find((a) => a.id === id) ?? null
}

/** Resolves a pending or fresh "play" request against the given account. */
function resolveRequest(state: AppState, account: Account, gameId: string): Transition {
  const resolution = resolveLaunch(account, gameId)
  const next = { ...state, requestedGame: null }
  if (resolution.kind === 'play') {
    return {
      state: { ...next, launchIssue: null },
      effects: [{ type: 'launch', gamesDir: account.games_dir, gameId, release: resolution.release }],
    }
  }
  const message =
    resolution.kind === 'error'
      ? resolution.message
      : `${gameId}: ${resolution.latest.version} is available (installed ${resolution.installed.version})`
  return { state: { ...next, launchIssue: resolution }, effects: [log('info', message)] }
}

function expireSession(state: AppState, account: Account, reason: string): Transition {
  const doc = replaceAccount(state.doc, clearSessionToken(account))
  return {
    state: { ...state, doc, screen: 'login' },
    effects: [{ type: 'persist', doc }, log('warn', reason)],
  }
}

type Transitions = { [K in AppEventType]: (state: AppState, event: AppEvent<K>) => Transition }

const transitions: Transitions = {
  'sync-requested': (state) => {
    const account = getActiveAccount(state.doc)
    if (!account) return unchanged({ ...state, screen: 'wizard' }, log('info', 'sync skipped: no active account'))
    if (!account.session_token) return unchanged({ ...state, screen: 'login' }, log('info', 'sync skipped: not logged in'))
    return unchanged(state, { type: 'fetch-catalog', account })
  },

  'catalog-fetched': (state, { accountId, catalog }) => {
    const account = findAccount(state.doc, accountId)
    if (!account) return unchanged(state, log('warn', `catalog for unknown account ${accountId} dropped`))

    let merged: Account
    let summary: string
    try {
      const result = reconcileCatalog(account, catalog)
      merged = result.account
      summary = `sync: ${result.summary.added.length} added, ${result.summary.patched.length} updated, ${result.summary.orphaned.length} orphaned, ${result.summary.newReleases} new release(s)`
    } catch (err) {
      if (!(err instanceof ReconcileError)) throw err
      // Keep the persisted library; the next poll tries again.
      return unchanged({ ...state, synced: true }, log('error', `sync aborted: ${err.message}`))
    }

    const doc = replaceAccount(state.doc, merged)
    const next: AppState = { ...state, doc, synced: true }
    const effects: Effect[] = [{ type: 'persist', doc }, log('info', summary)]
    if (state.requestedGame && accountId === state.doc.active_account_id) {
      const resolved = resolveRequest(next, merged, state.requestedGame)
      return { state: resolved.state, effects: [...effects, ...resolved.effects] }
    }
    return { state: next, effects }
  },

  'catalog-failed': (state, { accountId, error }) => {
    const account = findAccount(state.doc, accountId)
    if (!account) return unchanged(state)
    if (error.kind === 'NeedsRelogin') return expireSession(state, account, `session expired: ${error.message}`)

    const next: AppState = { ...state, synced: true }
    const effects: Effect[] = [log('warn', `catalog fetch failed (${error.kind}): ${error.message}`)]
    // Offline: fall back to what is already installed.
    if (state.requestedGame && accountId === state.doc.active_account_id) {
      const resolved = resolveRequest(next, account, state.requestedGame)
      return { state: resolved.state, effects: [...effects, ...resolved.effects] }
    }
    return { state: next, effects }
  },

  'login-succeeded': (state, { accountId, username, token }) => {
    const account = findAccount(state.doc, accountId)
    if (!account) return unchanged(state, log('warn', `login for unknown account ${accountId} dropped`))
    const updated = setSessionCredentials(account, username, token)
    const doc = replaceAccount(state.doc, updated)
    return {
      state: { ...state, doc, screen: 'main', loginError: null },
      effects: [{ type: 'persist', doc }, { type: 'fetch-catalog', account: updated }],
    }
  },

  'login-failed': (state, { error }) =>
    unchanged({ ...state, loginError: error.message }, log('warn', `login failed (${error.kind}): ${error.message}`)),

  'install-requested': (state, { gameId, channel, version }) => {
    if (state.downloads[gameId]) {
      return unchanged(state, log('info', `[${gameId}] install already in progress; request ignored`))
    }
    const account = getActiveAccount(state.doc)
    if (!account) return unchanged(state, log('warn', `[${gameId}] install requested without an active account`))
    const game = account.games.find((g) => g.name_id === gameId)
    if (!game) return unchanged(state, log('warn', `[${gameId}] install requested for an unknown game`))

    const release = version
      ? game.releases.find((r) => r.version === version && (!channel || r.channel_name === channel))
      : newestRelease(game.releases, { channel: channel ?? game.selected_channel })
    if (!release) {
      return unchanged(state, log('warn', `[${gameId}] no release ${channel ?? ''} ${version ?? ''}`.trimEnd()))
    }

    const task: DownloadTask = {
      gameId,
      accountId: account.id,
      channel: release.channel_name,
      version: release.version,
      sizeBytes: release.size_bytes,
      status: { kind: 'downloading', percent: 0 },
    }
    const request: DownloadRequest = {
      gameId,
      channel: release.channel_name,
      version: release.version,
      sizeBytes: release.size_bytes,
      serverUrl: account.url,
      gamesDir: account.games_dir,
      sessionToken: account.session_token,
    }
    return {
      state: { ...state, downloads: { ...state.downloads, [gameId]: task } },
      effects: [{ type: 'start-download', request }],
    }
  },

  'download-progress': (state, { event }) => {
    const task = state.downloads[event.gameId]
    if (event.phase !== 'downloading' || !task || task.status.kind !== 'downloading') return unchanged(state)
    const updated: DownloadTask = { ...task, status: { kind: 'downloading', percent: event.percent } }
    return unchanged({ ...state, downloads: { ...state.downloads, [event.gameId]: updated } })
  },

  'download-finished': (state, { release }) => {
    const task = state.downloads[release.gameId]
    const downloads = withoutTask(state.downloads, release.gameId)
    const account = findAccount(state.doc, task?.accountId ?? state.doc.active_account_id ?? '')
    if (!account) {
      return unchanged({ ...state, downloads }, log('warn', `[${release.gameId}] installed for an account that no longer exists`))
    }

    let updated: Account
    try {
      updated = setReleaseState(account, release.gameId, release.channel, release.version, 'Installed')
      const game = updated.games.find((g) => g.name_id === release.gameId)
      if (game && !game.selected_channel) updated = setSelectedChannel(updated, release.gameId, release.channel)
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err
      return unchanged({ ...state, downloads }, log('error', `[${release.gameId}] ${err.message}`))
    }

    const doc = replaceAccount(state.doc, updated)
    return {
      state: { ...state, doc, downloads },
      effects: [{ type: 'persist', doc }, log('info', `[${release.gameId}] installed ${release.channel}/${release.version}`)],
    }
  },

  'download-failed': (state, { gameId, error }) => {
    const task = state.downloads[gameId]
    if (!task) return unchanged(state)
    if (error.kind === 'Cancelled') {
      return unchanged({ ...state, downloads: withoutTask(state.downloads, gameId) }, log('info', `[${gameId}] download cancelled`))
    }

    const errored: DownloadTask = { ...task, status: { kind: 'errored', error: { kind: error.kind, message: describeDownloadError(error) } } }
    const next: AppState = { ...state, downloads: { ...state.downloads, [gameId]: errored } }
    const account = findAccount(state.doc, task.accountId)
    if (error.kind === 'NeedsRelogin' && account) {
      return expireSession(next, account, `[${gameId}] session expired during download`)
    }
    return unchanged(next, log('error', `[${gameId}] install failed (${error.kind}): ${error.message}`))
  },

  'download-dismissed': (state, { gameId }) => {
    const task = state.downloads[gameId]
    if (!task || task.status.kind !== 'errored') return unchanged(state)
    return unchanged({ ...state, downloads: withoutTask(state.downloads, gameId) })
  },

  'download-cancel-requested': (state, { gameId }) => {
    const task = state.downloads[gameId]
    if (!task || task.status.kind !== 'downloading') return unchanged(state)
    return unchanged(state, { type: 'cancel-download', gameId })
  },

  'game-requested': (state, { gameId }) => {
    if (!state.synced) return unchanged({ ...state, requestedGame: gameId }, log('info', `[${gameId}] requested; waiting for sync`))
    const account = getActiveAccount(state.doc)
    if (!account) return unchanged(state, log('warn', `[${gameId}] requested without an active account`))
    return resolveRequest(state, account, gameId)
  },

  'channel-selected': (state, { gameId, channel }) => {
    const account = getActiveAccount(state.doc)
    if (!account) return unchanged(state)
    let updated: Account
    try {
      updated = setSelectedChannel(account, gameId, channel)
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err
      return unchanged(state, log('warn', err.message))
    }
    const doc = replaceAccount(state.doc, updated)
    return { state: { ...state, doc }, effects: [{ type: 'persist', doc }] }
  },

  'launch-issue-cleared': (state) => unchanged({ ...state, launchIssue: null }),

  logout: (state) => {
    const account = getActiveAccount(state.doc)
    if (!account) return unchanged(state)
    const cancels: Effect[] = Object.values(state.downloads)
      .filter((t) => t.status.kind === 'downloading')
      .map((t): Effect => ({ type: 'cancel-download', gameId: t.gameId }))
    const doc = replaceAccount(state.doc, clearSessionToken(account))
    return {
      state: { ...state, doc, screen: 'login' },
      effects: [...cancels, { type: 'persist', doc }, log('info', `logged out of ${account.url}`)],
    }
  },

  // The write did not happen, so memory goes back to what is on disk.
  'persist-failed': (state, { restored, message }) =>
    unchanged(
      { ...state, doc: restored, screen: screenFor(restored) },
      log('error', `failed to save config, changes discarded: ${message}`)
    ),
}

/** Pure: the next state plus the side effects the runtime must carry out. */
export function update<K extends AppEventType>(state: AppState, event: AppEvent<K>): Transition {
  const transition = transitions[event.type]
  return transition(state, event)
}
