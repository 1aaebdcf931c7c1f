export type ReleaseState = 'NotInstalled' | 'Installed'

export type PlatformId = 'windows' | 'linux' | 'mac'

export type Release = {
  channel_name: string
  version: string
  description: string
  state: ReleaseState
  /** ISO-8601 timestamp as published by the catalog. */
  release_date: string
  /** Relative to the release's install directory. */
  executable_path: string
  /** Archive size; advisory, used for progress and the disk-space pre-flight. */
  size_bytes: number
}

export type Game = {
  name: string
  name_id: string
  description: string
  author: string
  /** Set when the catalog stops listing the game; local installs are kept. */
  orphaned: boolean
  selected_channel: string | null
  /** Newest releases first; older entries are install history. */
  releases: Release[]
}

export type Account = {
  id: string
  games_dir: string
  url: string
  username: string
  /** Cookie pair (`id=...`) issued by the server at login. */
  session_token: string | null
  games: Game[]
}

export type ConfigDocument = {
  active_account_id: string | null
  is_active: boolean
  accounts: Account[]
}

export interface RemoteRelease {
  channel: string
  version: string
  description: string
  release_date: string
  executable_path: string
  size_bytes: number
}

export interface RemoteGame {
  name: string
  name_id: string
  description: string
  author: string
  default_channel?: string | null
  releases: RemoteRelease[]
}

export interface CatalogResponse {
  games: RemoteGame[]
}

export interface DownloadRequest {
  gameId: string
  channel: string
  version: string
  sizeBytes: number
  serverUrl: string
  gamesDir: string
  sessionToken: string | null
}

export interface InstalledRelease {
  gameId: string
  channel: string
  version: string
  installDir: string
}

export type InstallProgressEvent =
  | {
      gameId: string
      phase: 'downloading'
      percent: number
      transferredBytes: number
      totalBytes?: number
    }
  | { gameId: string; phase: 'extracting' }
  | { gameId: string; phase: 'finished'; release: InstalledRelease }
