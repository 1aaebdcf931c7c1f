import type { Account, CatalogResponse, ConfigDocument, DownloadRequest, InstalledRelease, Release } from '@shared/types'
import { initialState, update, type AppEvent, type AppState, type Effect } from './app-state'
import { CatalogError, LoginError, errorMessage, toDownloadError } from './errors'
import type { LogSink, ProgressSink } from './installer'
import { launchRelease } from './launcher'

export interface DocumentStore {
  readonly document: ConfigDocument
  save(doc: ConfigDocument): ConfigDocument
}

export interface CatalogSource {
  fetchCatalog(account: Account): Promise<CatalogResponse>
  login(baseUrl: string, username: string, password: string): Promise<string>
}

export interface ReleaseInstaller {
  installRelease(req: DownloadRequest, signal?: AbortSignal): Promise<InstalledRelease>
}

export type Launcher = (gamesDir: string, gameId: string, release: Release) => Promise<number | null>

export type RuntimeOptions = {
  store: DocumentStore
  catalog: CatalogSource
  createInstaller: (progress: ProgressSink, log: LogSink) => ReleaseInstaller
  launch?: Launcher
  pollIntervalMs: number
  onChange?: (state: AppState) => void
}

/**
 * Single writer for application state. Events are queued and applied one at
 * a time through `update`; everything asynchronous (fetches, downloads,
 * launches) reports back by dispatching another event.
 */
export class LibraryRuntime {
  private state: AppState
  private readonly queue: AppEvent[] = []
  private draining = false
  private readonly controllers = new Map<string, AbortController>()
  private readonly inFlight = new Set<Promise<void>>()
  private fetching = false
  private pollTimer: NodeJS.Timeout | null = null
  private readonly installer: ReleaseInstaller
  /** Last document known to be on disk. */
  private saved: ConfigDocument

  constructor(private readonly opts: RuntimeOptions) {
    this.saved = opts.store.document
    this.state = initialState(this.saved)
    this.installer = opts.createInstaller(
      (event) => this.dispatch({ type: 'download-progress', event }),
      (line) => console.log(`[install] ${line}`)
    )
  }

  getState(): AppState {
    return this.state
  }

  dispatch(event: AppEvent): void {
    this.queue.push(event)
    if (this.draining) return
    this.draining = true
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        const { state, effects } = update(this.state, next)
        this.state = state
        for (const effect of effects) this.apply(effect)
      }
    } finally {
      this.draining = false
    }
    this.opts.onChange?.(this.state)
  }

  start(): void {
    if (!this.fetching) this.dispatch({ type: 'sync-requested' })
    if (this.pollTimer) return
    this.pollTimer = setInterval(() => {
      if (this.fetching) return
      this.dispatch({ type: 'sync-requested' })
    }, this.opts.pollIntervalMs)
  }

  async stop(): Promise<void> {
    if (this.pollTimer) clearInterval(this.pollTimer)
    this.pollTimer = null
    for (const controller of this.controllers.values()) controller.abort()
    await this.idle()
  }

  /** Resolves once every fetch and download started so far has settled. Launched games are not waited for. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  async login(username: string, password: string): Promise<boolean> {
    const account = this.state.doc.accounts.find((a) => a.id === this.state.doc.active_account_id)
    if (!account) {
      this.dispatch({ type: 'login-failed', error: new LoginError('NotFound', 'No active account to log in to') })
      return false
    }
    try {
      const token = await this.opts.catalog.login(account.url, username, password)
      this.dispatch({ type: 'login-succeeded', accountId: account.id, username, token })
      return true
    } catch (err) {
      const error = err instanceof LoginError ? err : new LoginError('ApiError', errorMessage(err), { cause: err })
      this.dispatch({ type: 'login-failed', error })
      return false
    }
  }

  private track(task: Promise<void>) {
    const tracked = task
      .catch((err) => console.error('[runtime] task failed:', err))
      .finally(() => this.inFlight.delete(tracked))
    this.inFlight.add(tracked)
  }

  private apply(effect: Effect) {
    switch (effect.type) {
      case 'persist':
        try {
          this.saved = this.opts.store.save(effect.doc)
        } catch (err) {
          this.dispatch({ type: 'persist-failed', restored: this.saved, message: errorMessage(err) })
        }
        return
      case 'fetch-catalog':
        this.fetchCatalog(effect.account)
        return
      case 'start-download':
        this.startDownload(effect.request)
        return
      case 'cancel-download':
        this.controllers.get(effect.gameId)?.abort()
        return
      case 'launch':
        this.launch(effect.gamesDir, effect.gameId, effect.release)
        return
      case 'log':
        if (effect.level === 'error') console.error(`[app] ${effect.message}`)
        else if (effect.level === 'warn') console.warn(`[app] ${effect.message}`)
        else console.log(`[app] ${effect.message}`)
        return
    }
  }

  private fetchCatalog(account: Account) {
    this.fetching = true
    this.track(
      this.opts.catalog.fetchCatalog(account).then(
        (catalog) => {
          this.fetching = false
          this.dispatch({ type: 'catalog-fetched', accountId: account.id, catalog })
        },
        (err: unknown) => {
          this.fetching = false
          const error =
            err instanceof CatalogError ? err : new CatalogError('ApiError', errorMessage(err), { cause: err })
          this.dispatch({ type: 'catalog-failed', accountId: account.id, error })
        }
      )
    )
  }

  private startDownload(request: DownloadRequest) {
    const controller = new AbortController()
    this.controllers.set(request.gameId, controller)
    this.track(
      this.installer
        .installRelease(request, controller.signal)
        .then(
          (release) => this.dispatch({ type: 'download-finished', release }),
          (err: unknown) => this.dispatch({ type: 'download-failed', gameId: request.gameId, error: toDownloadError(err) })
        )
        .finally(() => this.controllers.delete(request.gameId))
    )
  }

  private launch(gamesDir: string, gameId: string, release: Release) {
    const launch = this.opts.launch ?? launchRelease
    // Not tracked: a running game must not hold up shutdown.
    void launch(gamesDir, gameId, release).then(
      (code) => console.log(`[runtime] ${gameId} finished with exit code ${code ?? 'none'}`),
      (err: unknown) => console.error(`[runtime] failed to launch ${gameId}: ${errorMessage(err)}`)
    )
  }
}
