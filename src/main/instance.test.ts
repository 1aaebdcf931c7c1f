import { mkdtemp, readFile, utimes, writeFile } from 'fs/promises'
import * as net from 'net'
import { tmpdir } from 'os'
import { join } from 'path'
import fse from 'fs-extra'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CoordinationError } from './errors'
import {
  coordinateInstance,
  forwardToPrimary,
  parseCliArgs,
  parseLockFile,
  removeLockIfUnchanged,
  type CoordinatorOptions,
  type InstanceLock,
  type InstanceRole,
} from './instance'

const DEAD_PID = 999_999

let dir: string
let lockPath: string
let held: InstanceLock[]
let servers: net.Server[]

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'lc-inst-'))
  lockPath = join(dir, 'instance.lock')
  held = []
  servers = []
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(async () => {
  for (const lock of held) await lock.release()
  for (const server of servers) await new Promise<void>((resolve) => server.close(() => resolve()))
  vi.restoreAllMocks()
  await fse.remove(dir)
})

async function coordinate(opts: Partial<CoordinatorOptions> = {}): Promise<InstanceRole> {
  const role = await coordinateInstance({ lockPath, gameId: null, onForwarded: () => {}, ...opts })
  if (role.kind === 'primary') held.push(role.lock)
  return role
}

/** A listener that reads the request and hangs up without acknowledging. */
async function silentListener(path: string): Promise<{ connections: () => number }> {
  let count = 0
  const server = net.createServer((socket) => {
    count++
    socket.on('data', () => socket.end())
  })
  await new Promise<void>((resolve) => server.listen(path, () => resolve()))
  servers.push(server)
  return { connections: () => count }
}

async function coordinationFailure(promise: Promise<unknown>): Promise<CoordinationError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof CoordinationError) return err
    throw err
  }
  throw new Error('expected a CoordinationError')
}

describe('parseCliArgs', () => {
  it('accepts zero or one game id', () => {
    expect(parseCliArgs([])).toBeNull()
    expect(parseCliArgs(['my-game'])).toBe('my-game')
  })

  it('rejects more than one argument', () => {
    expect(() => parseCliArgs(['a', 'b'])).toThrow(CoordinationError)
    expect(() => parseCliArgs(['a', 'b'])).toThrow('usage: library-client [game-id] (got 2 arguments)')
  })
})

describe('parseLockFile', () => {
  it('reads both lock formats', () => {
    expect(parseLockFile('4242\n')).toEqual({ pid: 4242, endpoint: null })
    expect(parseLockFile('{"pid":7,"endpoint":"/tmp/x.sock"}')).toEqual({ pid: 7, endpoint: '/tmp/x.sock' })
    expect(parseLockFile('{"endpoint":"/tmp/x.sock"}')).toBeNull()
    expect(parseLockFile('garbage')).toBeNull()
  })
})

describe('coordinateInstance', () => {
  it('elects exactly one primary and delivers every other argument to it', async () => {
    const received: string[] = []
    const ids = ['a', 'b', 'c', 'd', 'e']

    const roles = await Promise.all(
      ids.map((gameId) => coordinate({ gameId, onForwarded: (id) => received.push(id) }))
    )

    const primaries = roles.filter((r) => r.kind === 'primary')
    expect(primaries).toHaveLength(1)
    const forwarded = roles.flatMap((r) => (r.kind === 'forwarded' && r.delivered ? [r.delivered] : []))
    expect(forwarded).toHaveLength(ids.length - 1)
    expect([...received].sort()).toEqual([...forwarded].sort())
  })

  it('keeps accepting forwarded requests for its whole lifetime', async () => {
    const received: string[] = []
    const primary = await coordinate({ onForwarded: (id) => received.push(id) })
    expect(primary.kind).toBe('primary')

    await coordinate({ gameId: 'first' })
    await coordinate({ gameId: 'second' })
    await coordinate({ gameId: null })

    expect(received).toEqual(['first', 'second'])
  })

  it('records its pid and endpoint in the lock file', async () => {
    const role = await coordinate()
    if (role.kind !== 'primary') throw new Error('expected primary')

    const info: unknown = JSON.parse(await readFile(lockPath, 'utf8'))
    expect(info).toEqual({ pid: process.pid, endpoint: role.lock.endpoint })
  })

  it('takes over a lock left by a dead process', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: DEAD_PID, endpoint: join(dir, 'gone.sock') }))

    const role = await coordinate({ isProcessAlive: (pid) => pid !== DEAD_PID })

    expect(role.kind).toBe('primary')
    expect(parseLockFile(await readFile(lockPath, 'utf8'))?.pid).toBe(process.pid)
  })

  it('takes over a bare-pid lock left by a dead process', async () => {
    await writeFile(lockPath, String(DEAD_PID))
    const role = await coordinate({ isProcessAlive: (pid) => pid !== DEAD_PID })
    expect(role.kind).toBe('primary')
  })

  it('takes over an unreadable lock', async () => {
    await writeFile(lockPath, 'not a lock')
    const role = await coordinate()
    expect(role.kind).toBe('primary')
  })

  it('fails when a live holder names no endpoint', async () => {
    await writeFile(lockPath, '4242')

    const err = await coordinationFailure(coordinate({ gameId: 'g', isProcessAlive: () => true }))

    expect(err.kind).toBe('ForwardFailed')
    expect(await readFile(lockPath, 'utf8')).toBe('4242')
  })

  it('fails when the live holder accepts but never acknowledges', async () => {
    const endpoint = join(dir, 'silent.sock')
    const listener = await silentListener(endpoint)
    await writeFile(lockPath, JSON.stringify({ pid: 4242, endpoint }))

    const err = await coordinationFailure(
      coordinate({ gameId: 'g', isProcessAlive: () => true, connectAttempts: 2, retryDelayMs: 10 })
    )

    expect(err.kind).toBe('ForwardFailed')
    expect(listener.connections()).toBe(2)
    expect(parseLockFile(await readFile(lockPath, 'utf8'))?.pid).toBe(4242)
  })

  it('takes over when the recorded pid is alive but nothing listens at the endpoint', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: 4242, endpoint: join(dir, 'nobody-listens.sock') }))

    const role = await coordinate({ gameId: 'g', isProcessAlive: () => true })

    expect(role.kind).toBe('primary')
    expect(parseLockFile(await readFile(lockPath, 'utf8'))?.pid).toBe(process.pid)
  })

  it('elects one primary when several processes find the same stale lock', async () => {
    await writeFile(lockPath, JSON.stringify({ pid: DEAD_PID, endpoint: join(dir, 'gone.sock') }))
    const received: string[] = []

    const roles = await Promise.all(
      ['a', 'b', 'c'].map((gameId, i) =>
        coordinate({
          gameId,
          pid: 101 + i,
          isProcessAlive: (pid) => pid !== DEAD_PID,
          onForwarded: (id) => received.push(id),
        })
      )
    )

    const primaries = roles.flatMap((r) => (r.kind === 'primary' ? [r.lock] : []))
    expect(primaries).toHaveLength(1)
    expect(received).toHaveLength(2)
    expect(parseLockFile(await readFile(lockPath, 'utf8'))).toEqual(primaries[0].info)
  })

  it('removes a guard abandoned by a crashed process', async () => {
    await writeFile(lockPath, String(DEAD_PID))
    const guard = `${lockPath}.reclaim`
    await writeFile(guard, '77')
    const old = new Date(Date.now() - 60_000)
    await utimes(guard, old, old)

    const role = await coordinate({ isProcessAlive: (pid) => pid !== DEAD_PID })

    expect(role.kind).toBe('primary')
    expect(await fse.pathExists(guard)).toBe(false)
  })

  it('lets the next process become primary after release', async () => {
    const first = await coordinate()
    if (first.kind !== 'primary') throw new Error('expected primary')

    await first.lock.release()
    expect(await fse.pathExists(lockPath)).toBe(false)

    const second = await coordinate()
    expect(second.kind).toBe('primary')
  })

  it('leaves a lock it no longer owns in place', async () => {
    const role = await coordinate()
    if (role.kind !== 'primary') throw new Error('expected primary')
    await writeFile(lockPath, JSON.stringify({ pid: 1, endpoint: null }))

    await role.lock.release()

    expect(await readFile(lockPath, 'utf8')).toBe('{"pid":1,"endpoint":null}')
    expect(console.warn).toHaveBeenCalledWith(
      `[instance] lock file ${lockPath} was taken over by another instance; left in place`
    )
  })
})

describe('removeLockIfUnchanged', () => {
  it('leaves a lock that replaced the stale one it was asked to remove', async () => {
    const stale = JSON.stringify({ pid: DEAD_PID, endpoint: null })
    const fresh = await coordinate()
    if (fresh.kind !== 'primary') throw new Error('expected primary')
    const current = await readFile(lockPath, 'utf8')

    await expect(removeLockIfUnchanged(lockPath, stale)).resolves.toBe('replaced')
    expect(await readFile(lockPath, 'utf8')).toBe(current)
    await expect(removeLockIfUnchanged(lockPath, current)).resolves.toBe('removed')
    await expect(removeLockIfUnchanged(lockPath, current)).resolves.toBe('absent')
  })
})

describe('forwardToPrimary', () => {
  it('gives up after the configured attempts', async () => {
    const endpoint = join(dir, 'silent.sock')
    const listener = await silentListener(endpoint)

    const err = await coordinationFailure(forwardToPrimary(endpoint, 'g', { attempts: 3, retryDelayMs: 5 }))

    expect(err.kind).toBe('ForwardFailed')
    expect(err.message).toBe(`Could not reach the running instance at ${endpoint}: connection closed without acknowledgement`)
    expect(listener.connections()).toBe(3)
  })

  it('reports a missing listener without retrying', async () => {
    const endpoint = join(dir, 'missing.sock')
    const err = await coordinationFailure(forwardToPrimary(endpoint, 'g', { attempts: 3, retryDelayMs: 5 }))
    expect([err.kind, err.message]).toEqual(['PrimaryGone', `Nothing is listening at ${endpoint}`])
  })
})
