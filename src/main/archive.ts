import { chmod, mkdtemp } from 'fs/promises'
import { join } from 'path'
import extractZip from 'extract-zip'
import fse from 'fs-extra'

import { ArchiveExtractError, errorMessage, isSystemError } from './errors'
import { getTempBaseDir } from './paths'

/** Zip "version made by" host id for Unix. */
const HOST_UNIX = 3
const S_IFMT = 0o170000
const S_IFLNK = 0o120000

type EntryMode = { fileName: string; mode: number }

export type StagedArchive = {
  /** Directory holding the extracted tree. */
  root: string
  entryCount: number
  /** Copies the extracted tree into `destination`, which must already exist. */
  commit(destination: string): Promise<void>
  dispose(): Promise<void>
}

function classify(err: unknown, what: string): ArchiveExtractError {
  if (err instanceof ArchiveExtractError) return err
  if (isSystemError(err)) return new ArchiveExtractError('IoError', `${what}: ${err.message}`, { cause: err })
  return new ArchiveExtractError('ArchiveError', `${what}: ${errorMessage(err)}`, { cause: err })
}

async function applyModes(root: string, modes: EntryMode[]): Promise<void> {
  if (process.platform === 'win32') return
  for (const { fileName, mode } of modes) {
    await chmod(join(root, fileName), mode)
  }
}

/**
 * Unpacks a zip held in memory into a private staging directory. Nothing is
 * written to the final destination until `commit` is called, so a corrupt
 * archive never leaves a half-populated install behind.
 *
 * Entry names that would resolve outside the staging root are rejected by
 * the zip reader and surface as `ArchiveError`.
 */
export async function stageArchive(buffer: Buffer): Promise<StagedArchive> {
  let workDir: string
  try {
    await fse.ensureDir(getTempBaseDir())
    workDir = await mkdtemp(join(getTempBaseDir(), 'library-client-'))
  } catch (err) {
    throw classify(err, 'Failed to create staging directory')
  }

  const zipPath = join(workDir, 'release.zip')
  const root = join(workDir, 'extracted')
  const modes: EntryMode[] = []
  let entryCount = 0

  const dispose = async () => {
    try {
      await fse.remove(workDir)
    } catch (err) {
      console.warn(`[archive] failed to remove ${workDir}: ${errorMessage(err)}`)
    }
  }

  try {
    await fse.outputFile(zipPath, buffer)
    await fse.ensureDir(root)
    await extractZip(zipPath, {
      dir: root,
      onEntry: (entry) => {
        entryCount++
        if (entry.versionMadeBy >> 8 !== HOST_UNIX) return
        const attr = entry.externalFileAttributes >>> 16
        const mode = attr & 0o7777
        if (mode !== 0 && (attr & S_IFMT) !== S_IFLNK) {
          modes.push({ fileName: entry.fileName, mode })
        }
      },
    })
    await applyModes(root, modes)
    await fse.remove(zipPath)
  } catch (err) {
    await dispose()
    throw classify(err, 'Failed to unpack archive')
  }

  return {
    root,
    entryCount,
    async commit(destination: string) {
      try {
        await fse.copy(root, destination, { overwrite: true, errorOnExist: false })
      } catch (err) {
        throw classify(err, `Failed to write ${destination}`)
      }
    },
    dispose,
  }
}

/** Extracts every entry of `buffer` under `destination`, creating it if needed. */
export async function extractArchive(buffer: Buffer, destination: string): Promise<number> {
  const staged = await stageArchive(buffer)
  try {
    try {
      await fse.ensureDir(destination)
    } catch (err) {
      throw classify(err, `Failed to create ${destination}`)
    }
    await staged.commit(destination)
    return staged.entryCount
  } finally {
    await staged.dispose()
  }
}
