import { spawn } from 'child_process'
import fse from 'fs-extra'

import type { Account, Release, ReleaseState } from '@shared/types'
import { LaunchError, errorMessage } from './errors'
import { getReleaseExecutablePath, getReleaseInstallDir } from './paths'

export type LaunchResolution =
  | { kind: 'play'; gameId: string; release: Release }
  | { kind: 'update-available'; gameId: string; latest: Release; installed: Release }
  | { kind: 'error'; gameId: string; message: string }

function releaseTime(r: Release): number {
  const t = Date.parse(r.release_date)
  return Number.isNaN(t) ? Number.NEGATIVE_INFINITY : t
}

export function newestRelease(
  releases: Release[],
  filter: { channel?: string | null; state?: ReleaseState } = {}
): Release | null {
  let best: Release | null = null
  for (const r of releases) {
    if (filter.channel && r.channel_name !== filter.channel) continue
    if (filter.state && r.state !== filter.state) continue
    if (!best || releaseTime(r) > releaseTime(best)) best = r
  }
  return best
}

/**
 * What "play <gameId>" means against the persisted library. The channel is
 * the game's selected one, or the channel of its newest installed release.
 */
export function resolveLaunch(account: Account, gameId: string): LaunchResolution {
  const game = account.games.find((g) => g.name_id === gameId)
  if (!game) return { kind: 'error', gameId, message: `Unknown game: ${gameId}` }

  const channel = game.selected_channel ?? newestRelease(game.releases, { state: 'Installed' })?.channel_name ?? null
  const installed = newestRelease(game.releases, { channel, state: 'Installed' })
  if (!installed) {
    return { kind: 'error', gameId, message: `${game.name} has no installed release${channel ? ` on ${channel}` : ''}` }
  }

  const latest = newestRelease(game.releases, { channel })
  if (latest && latest !== installed && releaseTime(latest) > releaseTime(installed)) {
    return { kind: 'update-available', gameId, latest, installed }
  }
  return { kind: 'play', gameId, release: installed }
}

/** Runs the release's executable from its install directory; resolves with the exit code. */
export async function launchRelease(gamesDir: string, gameId: string, release: Release): Promise<number | null> {
  const exePath = getReleaseExecutablePath(gamesDir, gameId, release.channel_name, release.version, release.executable_path)
  if (!(await fse.pathExists(exePath))) {
    throw new LaunchError('ExecutableMissing', `Executable not found: ${exePath}`)
  }
  const cwd = getReleaseInstallDir(gamesDir, gameId, release.channel_name, release.version)

  console.log(`[launch] ${gameId} ${release.channel_name}/${release.version}: ${exePath}`)
  return new Promise<number | null>((resolve, reject) => {
    const child = spawn(exePath, [], { cwd, env: process.env, stdio: 'inherit' })
    child.on('error', (err: Error) => {
      reject(new LaunchError('SpawnFailed', `Failed to start ${exePath}: ${errorMessage(err)}`, { cause: err }))
    })
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      console.log(`[launch] ${gameId} exited (code=${code ?? 'null'} signal=${signal ?? 'none'})`)
      resolve(code)
    })
  })
}
