import { request, type Dispatcher } from 'undici'
import fse from 'fs-extra'

import type { DownloadRequest, InstalledRelease, InstallProgressEvent, PlatformId } from '@shared/types'
import { stageArchive } from './archive'
import { getDiskSpaceForPath, type DiskSpace, type DiskSpaceProbe } from './diskspace'
import { DownloadError, errorMessage, toDownloadError } from './errors'
import { getReleaseInstallDir } from './paths'
import { joinUrl } from './catalog'

export type ProgressSink = (evt: InstallProgressEvent) => void
export type LogSink = (line: string) => void

export type InstallerOptions = {
  platform: PlatformId
  dispatcher?: Dispatcher
  diskSpace?: DiskSpaceProbe
}

export function releaseDownloadUrl(
  serverUrl: string,
  gameId: string,
  platform: PlatformId,
  channel: string,
  version: string
): string {
  const segments = [gameId, platform, channel, version].map(encodeURIComponent).join('/')
  return joinUrl(serverUrl, `releases/${segments}`)
}

function throwIfAborted(signal: AbortSignal | undefined, gameId: string) {
  if (signal?.aborted) throw new DownloadError('Cancelled', `[${gameId}] download cancelled`)
}

export class ReleaseInstallerService {
  constructor(
    private log: LogSink,
    private progress: ProgressSink,
    private opts: InstallerOptions
  ) {}

  private async checkFreeSpace(req: DownloadRequest) {
    if (req.sizeBytes <= 0) return
    const probe = this.opts.diskSpace ?? getDiskSpaceForPath
    let space: DiskSpace
    try {
      space = await probe(req.gamesDir)
    } catch (err) {
      this.log(`[${req.gameId}] disk space check skipped: ${errorMessage(err)}`)
      return
    }
    const { freeBytes } = space
    if (freeBytes < req.sizeBytes) {
      throw new DownloadError(
        'InsufficientSpace',
        `Not enough disk space in ${req.gamesDir}: need ${req.sizeBytes} bytes, ${freeBytes} free`
      )
    }
  }

  private async download(req: DownloadRequest, signal?: AbortSignal): Promise<Buffer> {
    const url = releaseDownloadUrl(req.serverUrl, req.gameId, this.opts.platform, req.channel, req.version)
    this.log(`[${req.gameId}] Downloading ${url}`)
    this.progress({ gameId: req.gameId, phase: 'downloading', percent: 0, transferredBytes: 0, totalBytes: req.sizeBytes })

    const headers: Record<string, string> = {}
    if (req.sessionToken) headers.cookie = req.sessionToken

    let res: Dispatcher.ResponseData
    try {
      res = await request(url, { method: 'GET', headers, signal, dispatcher: this.opts.dispatcher })
    } catch (err) {
      throwIfAborted(signal, req.gameId)
      throw new DownloadError('RequestFailed', errorMessage(err), { cause: err })
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump()
      if ((res.statusCode >= 300 && res.statusCode < 400) || res.statusCode === 401) {
        throw new DownloadError('NeedsRelogin', `Download answered HTTP ${res.statusCode}; session expired`)
      }
      if (res.statusCode === 404) throw new DownloadError('NotFound', `Release not found: ${url}`)
      throw new DownloadError('ApiError', `Download failed: HTTP ${res.statusCode}`)
    }

    const chunks: Buffer[] = []
    let transferred = 0
    try {
      for await (const chunk of res.body) {
        if (!Buffer.isBuffer(chunk) || chunk.length === 0) continue
        chunks.push(chunk)
        transferred += chunk.length
        // sizeBytes comes from the catalog and may be wrong.
        const percent = req.sizeBytes > 0 ? Math.min(100, (100 * transferred) / req.sizeBytes) : 0
        this.progress({
          gameId: req.gameId,
          phase: 'downloading',
          percent,
          transferredBytes: transferred,
          totalBytes: req.sizeBytes,
        })
      }
    } catch (err) {
      res.body.destroy()
      throwIfAborted(signal, req.gameId)
      throw new DownloadError('RequestFailed', `Download interrupted: ${errorMessage(err)}`, { cause: err })
    }

    if (transferred === 0) throw new DownloadError('EmptyResponse', `Empty response for ${url}`)
    return Buffer.concat(chunks, transferred)
  }

  /**
   * Downloads one release into memory, unpacks it and copies it to
   * games_dir/game/channel/version. Progress goes to the sink; the last event
   * on success is `finished`. Nothing reaches the install directory before
   * the whole archive has been received and unpacked.
   */
  async installRelease(req: DownloadRequest, signal?: AbortSignal): Promise<InstalledRelease> {
    try {
      throwIfAborted(signal, req.gameId)
      await this.checkFreeSpace(req)

      const buffer = await this.download(req, signal)
      throwIfAborted(signal, req.gameId)

      this.log(`[${req.gameId}] Extracting ${buffer.length} bytes`)
      this.progress({ gameId: req.gameId, phase: 'extracting' })
      const staged = await stageArchive(buffer)

      const installDir = getReleaseInstallDir(req.gamesDir, req.gameId, req.channel, req.version)
      try {
        throwIfAborted(signal, req.gameId)
        try {
          await fse.ensureDir(installDir)
        } catch (err) {
          throw new DownloadError('IoError', `Failed creating install folder ${installDir}: ${errorMessage(err)}`, {
            cause: err,
          })
        }
        this.log(`[${req.gameId}] Installing ${staged.entryCount} entries to ${installDir}`)
        await staged.commit(installDir)
      } finally {
        await staged.dispose()
      }

      const release: InstalledRelease = { gameId: req.gameId, channel: req.channel, version: req.version, installDir }
      this.progress({ gameId: req.gameId, phase: 'finished', release })
      this.log(`[${req.gameId}] Done`)
      return release
    } catch (err) {
      const e = toDownloadError(err)
      this.log(`[${req.gameId}] ERROR (${e.kind}): ${e.message}`)
      throw e
    }
  }
}
