import { join } from 'path'
import os from 'os'
import type { PlatformId } from '@shared/types'

export const APP_DIR_NAME = process.platform === 'linux' ? 'library-client' : 'LibraryClient'
export const LOCK_FILE_NAME = 'instance.lock'
export const SETTINGS_FILE_NAME = 'settings.json'

export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA || join(os.homedir(), 'AppData', 'Roaming')
    return join(appData, APP_DIR_NAME)
  }

  if (process.platform === 'darwin') {
    return join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME)
  }

  const xdg = process.env.XDG_CONFIG_HOME
  return join(xdg && xdg.trim() ? xdg : join(os.homedir(), '.config'), APP_DIR_NAME)
}

export function getLockFilePath(configDir: string): string {
  return join(configDir, LOCK_FILE_NAME)
}

export function detectPlatform(): PlatformId {
  if (process.platform === 'win32') return 'windows'
  if (process.platform === 'darwin') return 'mac'
  return 'linux'
}

/** games_dir/game/channel/version */
export function getReleaseInstallDir(gamesDir: string, gameId: string, channel: string, version: string): string {
  return join(gamesDir, gameId, channel, version)
}

export function getReleaseExecutablePath(
  gamesDir: string,
  gameId: string,
  channel: string,
  version: string,
  executablePath: string
): string {
  return join(getReleaseInstallDir(gamesDir, gameId, channel, version), executablePath)
}

export function getTempBaseDir(): string {
  return os.tmpdir()
}
