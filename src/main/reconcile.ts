import type { Account, CatalogResponse, Game, Release, RemoteGame, RemoteRelease } from '@shared/types'
import { ReconcileError } from './errors'

export type ReconcileSummary = {
  added: string[]
  patched: string[]
  orphaned: string[]
  newReleases: number
}

export type ReconcileResult = { account: Account; summary: ReconcileSummary }

function createRelease(r: RemoteRelease): Release {
  return {
    channel_name: r.channel,
    version: r.version,
    description: r.description,
    state: 'NotInstalled',
    release_date: r.release_date,
    executable_path: r.executable_path,
    size_bytes: r.size_bytes,
  }
}

function createGame(remote: RemoteGame): Game {
  const releases = remote.releases.map(createRelease)
  return {
    name: remote.name,
    name_id: remote.name_id,
    description: remote.description,
    author: remote.author,
    orphaned: false,
    selected_channel: remote.default_channel ?? releases[0]?.channel_name ?? null,
    releases,
  }
}

/** Drops repeated (channel, version) pairs; the first listing wins. */
function uniqueReleases(remote: RemoteGame): RemoteGame {
  const keys = new Set<string>()
  const releases: RemoteRelease[] = []
  for (const r of remote.releases) {
    const key = `${r.channel}/${r.version}`
    if (keys.has(key)) {
      console.warn(`[reconcile] ${remote.name_id} lists release ${key} more than once; keeping the first entry`)
      continue
    }
    keys.add(key)
    releases.push(r)
  }
  return releases.length === remote.releases.length ? remote : { ...remote, releases }
}

function isKnownRelease(existing: Release[], r: RemoteRelease): boolean {
  return existing.some((x) => x.channel_name === r.channel && x.version === r.version)
}

/**
 * New releases go in front of the existing list; existing entries are kept
 * as-is so their install state survives.
 */
function patchGame(existing: Game, remote: RemoteGame): { game: Game; added: number } {
  const fresh = remote.releases.filter((r) => !isKnownRelease(existing.releases, r)).map(createRelease)
  return {
    game: {
      name: remote.name,
      name_id: existing.name_id,
      description: remote.description,
      author: remote.author,
      orphaned: false,
      selected_channel: existing.selected_channel,
      releases: [...fresh, ...existing.releases],
    },
    added: fresh.length,
  }
}

/**
 * Merges a catalog into an account. Pure: the input account is not touched,
 * and on failure no partial result escapes, so the caller persists only a
 * fully merged account.
 */
export function reconcileCatalog(account: Account, catalog: CatalogResponse): ReconcileResult {
  const games = [...account.games]
  const pending = new Map(games.map((g) => [g.name_id, g]))
  const seen = new Set<string>()
  const summary: ReconcileSummary = { added: [], patched: [], orphaned: [], newReleases: 0 }

  for (const listed of catalog.games) {
    const remote = uniqueReleases(listed)
    if (seen.has(remote.name_id)) {
      console.warn(`[reconcile] catalog lists ${remote.name_id} more than once; keeping the first entry`)
      continue
    }
    seen.add(remote.name_id)

    const existing = pending.get(remote.name_id)
    if (!existing) {
      const game = createGame(remote)
      games.push(game)
      summary.added.push(game.name_id)
      summary.newReleases += game.releases.length
      continue
    }
    pending.delete(remote.name_id)

    const { game, added } = patchGame(existing, remote)
    const idx = games.findIndex((g) => g.name_id === game.name_id)
    if (idx === -1) {
      throw new ReconcileError('PatchTargetMissing', `Failed to find patch game with name_id: ${game.name_id}`)
    }
    games[idx] = game
    summary.patched.push(game.name_id)
    summary.newReleases += added
  }

  for (let i = 0; i < games.length; i++) {
    const g = games[i]
    if (!pending.has(g.name_id)) continue
    if (!g.orphaned) games[i] = { ...g, orphaned: true }
    summary.orphaned.push(g.name_id)
  }

  return { account: { ...account, games }, summary }
}
