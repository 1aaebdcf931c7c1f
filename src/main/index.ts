import { CatalogClient } from './catalog'
import { initConfig } from './config'
import { CoordinationError, errorMessage } from './errors'
import { coordinateInstance, parseCliArgs, type InstanceLock } from './instance'
import { ReleaseInstallerService } from './installer'
import { LibraryRuntime } from './runtime'
import { ConfigStore } from './store'

process.on('unhandledRejection', (err) => {
  console.error('[unhandledRejection]', err)
})
process.on('uncaughtException', (err) => {
  console.error('[uncaughtException]', err)
})

const EXIT_USAGE = 2

function installShutdownHandlers(lock: InstanceLock, runtime: LibraryRuntime) {
  let stopping = false
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return
    stopping = true
    console.log(`[startup] ${signal} received, shutting down`)
    runtime
      .stop()
      .then(() => lock.release())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(`[startup] shutdown failed: ${errorMessage(err)}`)
          process.exit(1)
        }
      )
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
  process.on('exit', () => lock.releaseSync())
}

/**
 * Headless setup: without a UI, the first account and the login come from
 * LIBRARY_CLIENT_SERVER_URL / _GAMES_DIR and _USERNAME / _PASSWORD.
 */
function addAccountFromEnv(store: ConfigStore, env: NodeJS.ProcessEnv) {
  if (store.getActiveAccount()) return
  const url = env.LIBRARY_CLIENT_SERVER_URL?.trim()
  const gamesDir = env.LIBRARY_CLIENT_GAMES_DIR?.trim()
  if (!url || !gamesDir) {
    console.warn('[startup] no account configured; set LIBRARY_CLIENT_SERVER_URL and LIBRARY_CLIENT_GAMES_DIR')
    return
  }
  const account = store.addAccount({ url, games_dir: gamesDir })
  console.log(`[startup] added account ${account.id} for ${account.url}`)
}

async function loginFromEnv(runtime: LibraryRuntime, env: NodeJS.ProcessEnv) {
  if (runtime.getState().screen !== 'login') return
  const username = env.LIBRARY_CLIENT_USERNAME
  const password = env.LIBRARY_CLIENT_PASSWORD
  if (!username || !password) {
    console.warn('[startup] not logged in; set LIBRARY_CLIENT_USERNAME and LIBRARY_CLIENT_PASSWORD')
    return
  }
  await runtime.login(username, password)
}

async function main(argv: string[]): Promise<number | null> {
  let gameId: string | null
  try {
    gameId = parseCliArgs(argv)
  } catch (err) {
    console.error(errorMessage(err))
    return EXIT_USAGE
  }

  const config = await initConfig()
  console.log(`[startup] config dir ${config.configDir} (platform ${config.platform})`)

  let runtime: LibraryRuntime | null = null
  const pending: string[] = []
  const role = await coordinateInstance({
    lockPath: config.lockPath,
    gameId,
    onForwarded: (forwarded) => {
      if (runtime) runtime.dispatch({ type: 'game-requested', gameId: forwarded })
      else pending.push(forwarded)
    },
  })
  if (role.kind === 'forwarded') return 0

  const store = new ConfigStore({ cwd: config.configDir })
  addAccountFromEnv(store, process.env)
  const catalog = new CatalogClient({ platform: config.platform, timeoutMs: config.requestTimeoutMs })
  const app = new LibraryRuntime({
    store,
    catalog,
    createInstaller: (progress, log) => new ReleaseInstallerService(log, progress, { platform: config.platform }),
    pollIntervalMs: config.catalogPollIntervalMs,
  })
  runtime = app
  installShutdownHandlers(role.lock, app)

  await loginFromEnv(app, process.env)
  app.start()
  if (gameId) app.dispatch({ type: 'game-requested', gameId })
  for (const id of pending.splice(0)) app.dispatch({ type: 'game-requested', gameId: id })
  return null
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== null) process.exit(code)
  },
  (err: unknown) => {
    if (err instanceof CoordinationError) {
      console.error(`[instance] ${err.kind}: ${err.message}`)
    } else {
      console.error('[startup] fatal:', err)
    }
    process.exit(1)
  }
)
