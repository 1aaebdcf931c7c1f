import { link, readFile, stat, unlink, writeFile } from 'fs/promises'
import { randomBytes } from 'crypto'
import { basename, dirname, join } from 'path'
import * as net from 'net'
import fse from 'fs-extra'

import { CoordinationError, errorMessage, isSystemError } from './errors'

/** What the lock file records about the primary. */
export type LockInfo = { pid: number; endpoint: string | null }

export type ForwardedHandler = (gameId: string) => void

export type CoordinatorOptions = {
  lockPath: string
  /** Game id to hand to the primary when this process turns out to be secondary. */
  gameId: string | null
  onForwarded: ForwardedHandler
  pid?: number
  isProcessAlive?: (pid: number) => boolean
  connectAttempts?: number
  retryDelayMs?: number
}

export type InstanceRole = { kind: 'primary'; lock: InstanceLock } | { kind: 'forwarded'; delivered: string | null }

const MAX_ACQUIRE_ATTEMPTS = 5
const ACK = 'ok'

const GUARD_ATTEMPTS = 40
const GUARD_RETRY_MS = 25
const GUARD_ABANDONED_MS = 10_000

export function parseCliArgs(args: string[]): string | null {
  if (args.length > 1) {
    throw new CoordinationError('Usage', `usage: library-client [game-id] (got ${args.length} arguments)`)
  }
  const gameId = args[0]?.trim()
  return gameId ? gameId : null
}

export function isPidAlive(pid: number): boolean {
  if (!pid || pid <= 0) return false
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: exists, owned by someone else
    return isSystemError(err) && err.code === 'EPERM'
  }
}

/**
 * Accepts the JSON `{ pid, endpoint }` form and, for staleness checks only, a
 * bare pid written by older clients.
 */
export function parseLockFile(contents: string): LockInfo | null {
  const text = contents.trim()
  if (/^\d+$/.test(text)) return { pid: Number(text), endpoint: null }
  try {
    const json: unknown = JSON.parse(text)
    if (typeof json !== 'object' || json === null) return null
    if (!('pid' in json) || typeof json.pid !== 'number') return null
    const endpoint = 'endpoint' in json && typeof json.endpoint === 'string' ? json.endpoint : null
    return { pid: json.pid, endpoint }
  } catch {
    return null
  }
}

export function makeEndpointName(lockPath: string, pid: number): string {
  const suffix = `${pid}-${randomBytes(4).toString('hex')}`
  if (process.platform === 'win32') return `\\\\.\\pipe\\library-client-${suffix}`
  return join(dirname(lockPath), `${basename(lockPath, '.lock')}-${suffix}.sock`)
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms))

/**
 * Receives forwarded requests on the primary. One newline-terminated JSON
 * message per connection; every connection is acknowledged and closed. A
 * connection that breaks mid-message is logged and dropped; the listener
 * keeps accepting.
 */
class ForwardReceiver {
  private server: net.Server | null = null

  constructor(
    readonly endpoint: string,
    private onForwarded: ForwardedHandler
  ) {}

  async start(): Promise<void> {
    if (process.platform !== 'win32') await fse.remove(this.endpoint)

    const server = net.createServer((socket) => {
      let buffered = ''
      socket.setEncoding('utf8')
      socket.on('data', (data: string) => {
        buffered += data
        const nl = buffered.indexOf('\n')
        if (nl === -1) return
        const line = buffered.slice(0, nl)
        buffered = ''
        socket.end(`${ACK}\n`)
        this.handleLine(line)
      })
      socket.on('error', (err) => {
        console.warn(`[instance] forwarded connection failed: ${err.message}`)
      })
    })

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(this.endpoint, () => {
        server.off('error', reject)
        resolve()
      })
    })
    server.on('error', (err) => console.error('[instance] receiver error:', err))
    this.server = server
  }

  private handleLine(line: string) {
    let gameId: unknown
    try {
      const msg: unknown = JSON.parse(line)
      gameId = typeof msg === 'object' && msg !== null && 'gameId' in msg ? msg.gameId : null
    } catch (err) {
      console.warn(`[instance] ignoring malformed forwarded message: ${errorMessage(err)}`)
      return
    }
    if (typeof gameId === 'string' && gameId) {
      console.log(`[instance] forwarded request for ${gameId}`)
      this.onForwarded(gameId)
    } else {
      console.log('[instance] second instance started without a game id')
    }
  }

  async stop(): Promise<void> {
    const server = this.server
    this.server = null
    if (!server) return
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }
}

/**
 * Held by the primary for its whole lifetime. The lock file is created
 * atomically (hard link of a fully written temp file), so readers never see
 * a half-written record.
 */
export class InstanceLock {
  private released = false

  constructor(
    readonly path: string,
    readonly info: LockInfo,
    private readonly contents: string,
    private readonly receiver: ForwardReceiver
  ) {}

  get endpoint(): string {
    return this.receiver.endpoint
  }

  async release(): Promise<void> {
    if (this.released) return
    this.released = true
    await this.receiver.stop()
    try {
      const outcome = await removeLockIfUnchanged(this.path, this.contents)
      if (outcome === 'replaced') {
        console.warn(`[instance] lock file ${this.path} was taken over by another instance; left in place`)
      } else if (outcome === 'busy') {
        console.warn(`[instance] could not remove lock file ${this.path}; the next start reclaims it`)
      }
    } catch (err) {
      console.warn(`[instance] failed to remove lock file: ${errorMessage(err)}`)
    }
  }

  /** For process 'exit' handlers, where nothing asynchronous runs. Gives up if the guard is taken. */
  releaseSync(): void {
    if (this.released) return
    this.released = true
    const guard = guardPath(this.path)
    try {
      if (!tryCreateLockSync(guard, String(process.pid))) return
      try {
        if (fse.readFileSync(this.path, 'utf8') === this.contents) fse.removeSync(this.path)
      } finally {
        fse.removeSync(guard)
      }
    } catch (err) {
      if (!(isSystemError(err) && err.code === 'ENOENT')) {
        console.warn(`[instance] failed to remove lock file: ${errorMessage(err)}`)
      }
    }
  }
}

const tempName = (path: string, ext: string) => `${path}.${process.pid}-${randomBytes(4).toString('hex')}.${ext}`

async function tryCreateLock(lockPath: string, contents: string): Promise<boolean> {
  const tmp = tempName(lockPath, 'tmp')
  await writeFile(tmp, contents, 'utf8')
  try {
    await link(tmp, lockPath)
    return true
  } catch (err) {
    if (isSystemError(err) && err.code === 'EEXIST') return false
    throw err
  } finally {
    await fse.remove(tmp)
  }
}

function tryCreateLockSync(lockPath: string, contents: string): boolean {
  const tmp = tempName(lockPath, 'tmp')
  fse.writeFileSync(tmp, contents, 'utf8')
  try {
    fse.linkSync(tmp, lockPath)
    return true
  } catch (err) {
    if (isSystemError(err) && err.code === 'EEXIST') return false
    throw err
  } finally {
    fse.removeSync(tmp)
  }
}

async function readLock(lockPath: string): Promise<{ raw: string; info: LockInfo | null } | null> {
  try {
    const raw = await readFile(lockPath, 'utf8')
    return { raw, info: parseLockFile(raw) }
  } catch (err) {
    if (isSystemError(err) && err.code === 'ENOENT') return null
    throw err
  }
}

const guardPath = (lockPath: string) => `${lockPath}.reclaim`

async function removeAbandonedGuard(path: string): Promise<void> {
  try {
    const { mtimeMs } = await stat(path)
    if (Date.now() - mtimeMs < GUARD_ABANDONED_MS) return
    console.warn(`[instance] removing abandoned guard ${path}`)
    await fse.remove(path)
  } catch (err) {
    if (!(isSystemError(err) && err.code === 'ENOENT')) throw err
  }
}

/**
 * Every removal of the lock file happens under this guard. Creation does not
 * need it: the hard link fails while the file exists. So inside the guard the
 * file can only change through the caller. Returns null when the guard stays
 * taken.
 */
async function withRemovalGuard<T>(lockPath: string, fn: () => Promise<T>): Promise<T | null> {
  const path = guardPath(lockPath)
  for (let i = 0; i < GUARD_ATTEMPTS; i++) {
    if (await tryCreateLock(path, String(process.pid))) {
      try {
        return await fn()
      } finally {
        await fse.remove(path)
      }
    }
    await removeAbandonedGuard(path)
    await sleep(GUARD_RETRY_MS)
  }
  return null
}

export type RemoveOutcome = 'removed' | 'absent' | 'replaced' | 'busy'

/** Deletes the lock file only if it still holds `expected`. */
export async function removeLockIfUnchanged(lockPath: string, expected: string): Promise<RemoveOutcome> {
  const outcome = await withRemovalGuard(lockPath, async (): Promise<RemoveOutcome> => {
    const current = await readLock(lockPath)
    if (!current) return 'absent'
    if (current.raw !== expected) return 'replaced'
    await unlink(lockPath)
    return 'removed'
  })
  return outcome ?? 'busy'
}

export async function forwardToPrimary(
  endpoint: string,
  gameId: string | null,
  opts: { attempts?: number; retryDelayMs?: number } = {}
): Promise<void> {
  const attempts = opts.attempts ?? 3
  const retryDelayMs = opts.retryDelayMs ?? 200
  let lastError: unknown = null

  for (let i = 0; i < attempts; i++) {
    try {
      await sendOnce(endpoint, JSON.stringify({ gameId }))
      return
    } catch (err) {
      // The receiver lives as long as the primary, so no listener means no primary.
      if (isSystemError(err) && (err.code === 'ENOENT' || err.code === 'ECONNREFUSED')) {
        throw new CoordinationError('PrimaryGone', `Nothing is listening at ${endpoint}`, { cause: err })
      }
      lastError = err
      if (i < attempts - 1) await sleep(retryDelayMs)
    }
  }
  throw new CoordinationError(
    'ForwardFailed',
    `Could not reach the running instance at ${endpoint}: ${errorMessage(lastError)}`,
    { cause: lastError }
  )
}

function sendOnce(endpoint: string, payload: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let reply = ''
    const socket = net.createConnection(endpoint, () => {
      socket.write(`${payload}\n`)
    })
    socket.setEncoding('utf8')
    socket.setTimeout(2_000, () => socket.destroy(new Error('timed out waiting for acknowledgement')))
    socket.on('data', (data: string) => {
      reply += data
    })
    socket.on('error', reject)
    socket.on('close', () => {
      if (reply.trim() === ACK) resolve()
      else reject(new Error('connection closed without acknowledgement'))
    })
  })
}

async function reclaim(lockPath: string, staleRaw: string): Promise<void> {
  try {
    await removeLockIfUnchanged(lockPath, staleRaw)
  } catch (err) {
    throw new CoordinationError('LockIo', `Cannot reclaim ${lockPath}: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Decides whether this process is the primary. The primary gets an
 * `InstanceLock` with a listening receiver; a secondary delivers its game id
 * to the primary and reports that it forwarded.
 */
export async function coordinateInstance(opts: CoordinatorOptions): Promise<InstanceRole> {
  const pid = opts.pid ?? process.pid
  const isAlive = opts.isProcessAlive ?? isPidAlive

  try {
    await fse.ensureDir(dirname(opts.lockPath))
  } catch (err) {
    throw new CoordinationError('LockIo', `Cannot create ${dirname(opts.lockPath)}: ${errorMessage(err)}`, { cause: err })
  }

  for (let attempt = 0; attempt < MAX_ACQUIRE_ATTEMPTS; attempt++) {
    const receiver = new ForwardReceiver(makeEndpointName(opts.lockPath, pid), opts.onForwarded)
    const info: LockInfo = { pid, endpoint: receiver.endpoint }
    const contents = JSON.stringify(info)

    let acquired: boolean
    try {
      await receiver.start()
      acquired = await tryCreateLock(opts.lockPath, contents)
    } catch (err) {
      await receiver.stop()
      throw new CoordinationError('LockIo', `Lock file ${opts.lockPath} unusable: ${errorMessage(err)}`, { cause: err })
    }

    if (acquired) {
      console.log(`[instance] primary (pid ${pid}) listening on ${receiver.endpoint}`)
      return { kind: 'primary', lock: new InstanceLock(opts.lockPath, info, contents, receiver) }
    }
    await receiver.stop()

    let existing: Awaited<ReturnType<typeof readLock>>
    try {
      existing = await readLock(opts.lockPath)
    } catch (err) {
      throw new CoordinationError('LockIo', `Cannot read ${opts.lockPath}: ${errorMessage(err)}`, { cause: err })
    }
    // Released between our attempt and the read.
    if (!existing) continue

    const { raw, info: holder } = existing
    if (!holder || !isAlive(holder.pid)) {
      console.warn(`[instance] reclaiming stale lock ${opts.lockPath} (${holder ? `pid ${holder.pid}` : 'unreadable'})`)
      await reclaim(opts.lockPath, raw)
      continue
    }

    if (!holder.endpoint) {
      throw new CoordinationError(
        'ForwardFailed',
        `Instance ${holder.pid} is running but its lock file names no endpoint (older client?)`
      )
    }

    try {
      await forwardToPrimary(holder.endpoint, opts.gameId, {
        attempts: opts.connectAttempts,
        retryDelayMs: opts.retryDelayMs,
      })
    } catch (err) {
      if (!(err instanceof CoordinationError && err.kind === 'PrimaryGone')) throw err
      // pid reused by an unrelated process
      console.warn(`[instance] pid ${holder.pid} holds ${opts.lockPath} but nothing listens at ${holder.endpoint}; reclaiming`)
      await reclaim(opts.lockPath, raw)
      continue
    }
    console.log(`[instance] handed ${opts.gameId ?? '(no game)'} to running instance ${holder.pid}`)
    return { kind: 'forwarded', delivered: opts.gameId }
  }

  throw new CoordinationError('LockIo', `Could not acquire ${opts.lockPath} after ${MAX_ACQUIRE_ATTEMPTS} attempts`)
}
