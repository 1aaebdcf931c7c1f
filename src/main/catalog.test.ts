import { MockAgent } from 'undici'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Account } from '@shared/types'
import { CatalogClient, joinUrl, parseCatalog, parseSessionCookie } from './catalog'
import { CatalogError, LoginError } from './errors'

const ORIGIN = 'http://drops.test'

let agent: MockAgent

beforeEach(() => {
  agent = new MockAgent()
  agent.disableNetConnect()
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

afterEach(async () => {
  vi.restoreAllMocks()
  await agent.close()
})

const client = () => new CatalogClient({ platform: 'linux', timeoutMs: 1_000, dispatcher: agent })

const account: Account = {
  id: 'acc-1',
  games_dir: '/games',
  url: ORIGIN,
  username: 'tester',
  session_token: 'id=test-session',
  games: [],
}

const catalogBody = {
  games: [
    {
      name: 'Game',
      name_id: 'g',
      description: 'A game',
      author: 'someone',
      default_channel: 'stable',
      releases: [
        {
          channel: 'stable',
          version: '1.0.0',
          description: 'first',
          release_date: '2024-01-01T00:00:00Z',
          executable_path: 'bin/game',
          size_bytes: 2048,
        },
      ],
    },
  ],
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected a rejection')
}

describe('CatalogClient.login', () => {
  it('returns the session cookie pair', async () => {
    const basic = Buffer.from('tester:test-secret').toString('base64')
    agent
      .get(ORIGIN)
      .intercept({ path: '/login', method: 'POST', headers: { authorization: `Basic ${basic}` } })
      .reply(200, '', { headers: { 'set-cookie': 'id=test-session; Path=/; HttpOnly' } })

    await expect(client().login(`${ORIGIN}/`, 'tester', 'test-secret')).resolves.toBe('id=test-session')
  })

  it.each([
    [401, 'BadCredentials'],
    [404, 'NotFound'],
    [500, 'ApiError'],
  ] as const)('maps HTTP %i to %s', async (status, kind) => {
    agent.get(ORIGIN).intercept({ path: '/login', method: 'POST' }).reply(status, '')

    const err = await caught(client().login(ORIGIN, 'tester', 'wrong'))
    expect(err).toBeInstanceOf(LoginError)
    expect(err instanceof LoginError ? err.kind : null).toBe(kind)
  })

  it('treats a missing cookie as an API error', async () => {
    agent.get(ORIGIN).intercept({ path: '/login', method: 'POST' }).reply(200, '')

    const err = await caught(client().login(ORIGIN, 'tester', 'test-secret'))
    expect(err instanceof LoginError ? err.message : null).toBe('Login response did not set a session cookie')
  })

  it('reports an unreachable host', async () => {
    const err = await caught(client().login('http://elsewhere.test', 'tester', 'test-secret'))
    expect(err instanceof LoginError ? err.kind : null).toBe('Unreachable')
  })
})

describe('CatalogClient.fetchCatalog', () => {
  it('sends the platform and session cookie and parses the games', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/games?platform=linux', method: 'GET', headers: { cookie: 'id=test-session' } })
      .reply(200, catalogBody, { headers: { 'content-type': 'application/json; charset=utf-8' } })

    const catalog = await client().fetchCatalog(account)

    expect(catalog.games).toEqual([
      {
        name: 'Game',
        name_id: 'g',
        description: 'A game',
        author: 'someone',
        default_channel: 'stable',
        releases: catalogBody.games[0].releases,
      },
    ])
  })

  it.each([
    [302, 'NeedsRelogin'],
    [401, 'NeedsRelogin'],
    [404, 'NotFound'],
    [503, 'ApiError'],
  ] as const)('maps HTTP %i to %s', async (status, kind) => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/games?platform=linux', method: 'GET' })
      .reply(status, '', { headers: { location: `${ORIGIN}/login` } })

    const err = await caught(client().fetchCatalog(account))
    expect(err).toBeInstanceOf(CatalogError)
    expect(err instanceof CatalogError ? err.kind : null).toBe(kind)
  })

  it('rejects an HTML page', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/games?platform=linux', method: 'GET' })
      .reply(200, '<!DOCTYPE html><html><body>login</body></html>', { headers: { 'content-type': 'text/html' } })

    const err = await caught(client().fetchCatalog(account))
    expect(err instanceof CatalogError ? [err.kind, err.message] : null).toEqual([
      'InvalidResponse',
      'Catalog URL returned HTML instead of JSON',
    ])
  })

  it('rejects JSON of the wrong shape', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/games?platform=linux', method: 'GET' })
      .reply(200, { games: [{ name: 'No id', releases: [] }] }, { headers: { 'content-type': 'application/json' } })

    const err = await caught(client().fetchCatalog(account))
    expect(err instanceof CatalogError ? [err.kind, err.message] : null).toEqual([
      'InvalidResponse',
      'invalid catalog: game.name_id is missing',
    ])
  })
})

describe('CatalogClient.canReachHost', () => {
  it('is true for any HTTP answer and false without one', async () => {
    agent.get(ORIGIN).intercept({ path: '/', method: 'GET' }).reply(404, 'nothing here')

    await expect(client().canReachHost(`${ORIGIN}/`)).resolves.toBe(true)
    await expect(client().canReachHost('http://elsewhere.test/')).resolves.toBe(false)
  })
})

describe('parseCatalog', () => {
  it('fills optional fields', () => {
    const parsed = parseCatalog({
      games: [
        {
          name: 'G',
          name_id: 'g',
          releases: [{ channel: 'c', version: 'v', release_date: 'd', executable_path: 'e', size_bytes: 1 }],
        },
      ],
    })
    expect(parsed.games[0]).toEqual({
      name: 'G',
      name_id: 'g',
      description: '',
      author: '',
      default_channel: null,
      releases: [{ channel: 'c', version: 'v', description: '', release_date: 'd', executable_path: 'e', size_bytes: 1 }],
    })
  })

  it('requires numeric sizes', () => {
    expect(() =>
      parseCatalog({
        games: [
          {
            name: 'G',
            name_id: 'g',
            releases: [{ channel: 'c', version: 'v', release_date: 'd', executable_path: 'e', size_bytes: '1' }],
          },
        ],
      })
    ).toThrow('invalid catalog: game g: release.size_bytes is not a number')
  })
})

describe('helpers', () => {
  it('extracts the id cookie from one or many headers', () => {
    expect(parseSessionCookie('id=abc; Path=/')).toBe('id=abc')
    expect(parseSessionCookie(['theme=dark', 'other=1; id=xyz; HttpOnly'])).toBe('id=xyz')
    expect(parseSessionCookie('id=; Path=/')).toBeNull()
    expect(parseSessionCookie(undefined)).toBeNull()
  })

  it('joins urls with exactly one slash', () => {
    expect(joinUrl('http://a.test/', '/games')).toBe('http://a.test/games')
    expect(joinUrl('http://a.test/base', 'games')).toBe('http://a.test/base/games')
  })
})
