import { dirname, parse } from 'path'
import checkDiskSpace from 'check-disk-space'
import fse from 'fs-extra'

export type DiskSpace = { freeBytes: number; totalBytes: number }
export type DiskSpaceProbe = (targetPath: string) => Promise<DiskSpace>

/** Walks up to the nearest existing ancestor; the games dir may not exist yet. */
async function nearestExistingPath(p: string): Promise<string> {
  let current = p
  while (!(await fse.pathExists(current))) {
    const parent = dirname(current)
    if (parent === current) return parse(p).root
    current = parent
  }
  return current
}

export async function getDiskSpaceForPath(targetPath: string): Promise<DiskSpace> {
  const p = targetPath.trim()
  if (!p) throw new Error('targetPath is required')

  const res = await checkDiskSpace(await nearestExistingPath(p))
  return {
    freeBytes: res.free,
    totalBytes: res.size,
  }
}
