import { type Logger, NullLogger } from "@keyscope/logger"
import type { KeyspaceDataSource, ServerInfo } from "../../ports/data-source"
import type { KeyDetail, KeyValue } from "../../ports/key-detail"
import type { KeyType, ValueKeyType } from "../../ports/key-type"
import type { KeyspaceTree } from "../../ports/namespace-node"
import { isTerminalCursor, TERMINAL_CURSOR } from "../../ports/scan-cursor"
import type { DatabaseOption, SessionState } from "../../ports/session-state"
import { KeyspaceCache } from "../cache/keyspace-cache"
import { isScanAborted, KeyspaceError, ScanAbortedError, TransportError } from "../errors/keyspace-errors"
import { filterKeys } from "../filter/local-filter"
import { globMatch } from "../glob/glob-match"
import { TypeBatcher } from "../metadata/type-batcher"
import { VirtualKeyOverlay } from "../overlay/virtual-key-overlay"
import { CursorPaginator } from "../pagination/cursor-paginator"
import { buildNamespaceTree } from "../tree/namespace-tree"
import { DEFAULT_PAGE_LIMIT, parsePageLimit } from "./page-limit"
import { SerialQueue } from "./serial-queue"
import { isWriteCommand } from "./write-commands"

export type KeyspaceSessionDeps = {
  source: KeyspaceDataSource
  logger?: Logger
}

export type KeyspaceSessionOptions = {
  /** @default ":" */
  separator: string
  /** Keys requested per page. @default 2000 */
  pageLimit: number
  /** Smallest COUNT hint per scan round trip. @default 10 */
  scanFloor: number
  /** Keys per type-resolution pipeline. @default 1000 */
  typeBatchSize: number
}

type LoadKind = "first" | "more"

/**
 * Browsing state for one store connection: the discovered keys, pending
 * virtual keys, the filter and the tree built from them.
 *
 * Every call into the data source goes through one serial queue, so a page
 * load and a write never interleave. Starting a first-page load, a refresh,
 * a database switch, a reconnect or `cancelLoads()` aborts the load in
 * flight; its caller gets `ScanAbortedError` and nothing it fetched is kept.
 */
export class KeyspaceSession {
  private readonly cache = new KeyspaceCache()
  private readonly overlay = new VirtualKeyOverlay()
  private readonly queue = new SerialQueue()
  private readonly loads = new Map<AbortController, LoadKind>()
  private readonly paginator: CursorPaginator
  private readonly batcher: TypeBatcher
  private readonly logger: Logger
  private readonly separator: string

  private loaded = false
  private filterText = ""
  private pageLimitValue: number

  constructor(
    private readonly deps: KeyspaceSessionDeps,
    opts: Partial<KeyspaceSessionOptions> = {},
  ) {
    this.separator = opts.separator ?? ":"
    if (this.separator === "") {
      throw KeyspaceError.invalidArgument("Separator must not be empty", { separator: this.separator })
    }

    this.pageLimitValue = parsePageLimit(opts.pageLimit ?? DEFAULT_PAGE_LIMIT)
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "keyspace-session",
      session: deps.source.label,
    })
    this.paginator = new CursorPaginator(
      { source: deps.source, logger: this.logger },
      { floorCount: opts.scanFloor ?? 10 },
    )
    this.batcher = new TypeBatcher({ source: deps.source }, { batchSize: opts.typeBatchSize ?? 1000 })
  }

  get state(): SessionState {
    const kinds = [...this.loads.values()]

    if (kinds.includes("first")) return "loading"
    if (kinds.includes("more")) return "loading_more"
    if (!this.loaded) return "empty"
    return this.filterText === "" ? "ready" : "filtered"
  }

  get pattern(): string {
    return this.cache.pattern
  }

  get filter(): string {
    return this.filterText
  }

  get pageLimit(): number {
    return this.pageLimitValue
  }

  /** Parses and stores the page size used by later loads; returns the value kept. */
  setPageLimit(raw: string | number | undefined): number {
    this.pageLimitValue = parsePageLimit(raw)
    return this.pageLimitValue
  }

  /**
   * Scans from the beginning for `pattern` and replaces the cache with the
   * result. On failure the cache keeps its previous contents.
   */
  async loadFirstPage(pattern: string = this.cache.pattern, minCount: number = this.pageLimitValue): Promise<KeyspaceTree> {
    this.cancelLoads()

    const controller = new AbortController()
    this.loads.set(controller, "first")

    try {
      await this.exec(async () => {
        const page = await this.paginator.fetch(TERMINAL_CURSOR, pattern, minCount, controller.signal)
        const types = await this.batcher.resolveTypes(page.keys)

        if (controller.signal.aborted) throw ScanAbortedError.create(pattern, page.cursor)

        this.cache.reset(pattern)
        this.cache.merge(page.keys, types, page.cursor)
        this.loaded = true
        this.confirmResolved(types)

        this.logger.debug("First page loaded", { pattern, cursor: page.cursor, count: this.cache.size })
      })
    } catch (err) {
      this.logFailure("First page load", err, { pattern })
      throw err
    } finally {
      this.loads.delete(controller)
    }

    return this.currentTree()
  }

  /**
   * Continues the scan from the cached cursor and appends what it finds.
   * A no-op on a completed scan.
   */
  async loadMore(minCount: number = this.pageLimitValue): Promise<KeyspaceTree> {
    if (!this.cache.hasMore) return this.currentTree()

    const controller = new AbortController()
    this.loads.set(controller, "more")

    try {
      await this.exec(async () => {
        // read inside the task: an earlier load may have moved the cursor
        const cursor = this.cache.cursor
        const pattern = this.cache.pattern
        if (isTerminalCursor(cursor)) return

        const page = await this.paginator.fetch(cursor, pattern, minCount, controller.signal)
        const types = await this.batcher.resolveTypes(page.keys)

        if (controller.signal.aborted) throw ScanAbortedError.create(pattern, page.cursor)

        this.cache.merge(page.keys, types, page.cursor)
        this.confirmResolved(types)

        this.logger.debug("Next page loaded", { pattern, cursor: page.cursor, count: page.keys.length })
      })
    } catch (err) {
      this.logFailure("Next page load", err, { cursor: this.cache.cursor })
      throw err
    } finally {
      this.loads.delete(controller)
    }

    return this.currentTree()
  }

  /**
   * Aborts every page load in flight, e.g. when the caller navigates away.
   * Each aborted load rejects with `ScanAbortedError` and keeps nothing.
   */
  cancelLoads(): void {
    for (const controller of this.loads.keys()) controller.abort()
  }

  /** Rescans the active pattern from the start. */
  refresh(): Promise<KeyspaceTree> {
    return this.loadFirstPage(this.cache.pattern)
  }

  /** Narrows the tree to keys containing `text`, ignoring case. No store access. */
  applyFilter(text: string): KeyspaceTree {
    this.filterText = text
    return this.currentTree()
  }

  /** Server-side search: reloads with `*text*`, or `*` for blank text. */
  search(text: string): Promise<KeyspaceTree> {
    return this.loadFirstPage(text === "" ? "*" : `*${text}*`)
  }

  declareVirtualKey(key: string, type: ValueKeyType): KeyspaceTree {
    this.overlay.declare(key, type)
    this.logger.debug("Virtual key declared", { key, type })
    return this.currentTree()
  }

  /**
   * Re-reads the type of `key` after a write. Confirms a pending virtual
   * key, adds a new key matching the active pattern and drops a key that no
   * longer exists.
   */
  async onKeyCommitted(key: string): Promise<KeyType> {
    return this.exec(async () => {
      const type = await this.deps.source.typeOf(key)

      if (this.overlay.confirm(key, type)) {
        this.logger.debug("Virtual key confirmed", { key, type })
      }

      if (type === "none") {
        if (!this.overlay.has(key)) this.cache.forget(key)
      } else if (this.loaded && (this.cache.has(key) || globMatch(this.cache.pattern, key))) {
        this.cache.merge([key], new Map([[key, type]]), this.cache.cursor)
      }

      return type
    })
  }

  /** Deletes `key` in the store and forgets it locally, virtual or not. */
  async deleteKey(key: string): Promise<boolean> {
    return this.exec(async () => {
      const removed = await this.deps.source.deleteKey(key)
      this.overlay.remove(key)
      this.cache.forget(key)
      return removed
    })
  }

  /**
   * Everything the detail pane shows for `key`. A key the store does not
   * have yet falls back to its declared virtual type.
   */
  async selectKey(key: string): Promise<KeyDetail> {
    return this.exec(async () => {
      const source = this.deps.source
      let type = await source.typeOf(key)
      let virtual = false

      if (type === "none") {
        const declared = this.overlay.typeFor(key)
        if (declared !== undefined) {
          type = declared
          virtual = true
        }
      }

      const value = await this.readValue(key, type)
      const ttl = await source.ttl(key)
      const encoding = await source.encoding(key)
      const memoryUsage = await source.memoryUsage(key)

      return {
        key,
        type,
        virtual,
        ttl,
        encoding,
        ...(memoryUsage !== undefined && { memoryUsage }),
        value,
      }
    })
  }

  /**
   * Runs a write against `key` in the queue, then reconciles the cache and
   * overlay with the key's new type.
   *
   * @example
   * ```ts
   * await session.mutate("user:1", (source) => source.hashSet("user:1", "name", "Ada"))
   * ```
   */
  async mutate<T>(key: string, write: (source: KeyspaceDataSource) => Promise<T>): Promise<T> {
    const result = await this.exec(() => write(this.deps.source))
    await this.onKeyCommitted(key)
    return result
  }

  /** Runs a console command; commands that change keys reload the first page. */
  async runCommand(line: string): Promise<string> {
    const output = await this.exec(() => this.deps.source.executeCommand(line))

    if (isWriteCommand(line)) {
      await this.loadFirstPage(this.cache.pattern)
    }

    return output
  }

  /**
   * Selects another logical database. On success the cache and overlay are
   * cleared and the session is empty until the next load.
   */
  async switchDb(index: number): Promise<boolean> {
    if (!Number.isInteger(index) || index < 0) {
      throw KeyspaceError.invalidArgument("Database index must be a non-negative integer", { db: index })
    }

    this.cancelLoads()

    const switched = await this.exec(() => this.deps.source.switchDb(index))

    if (!switched) {
      this.logger.warn("Database switch refused", { db: index })
      return false
    }

    this.clearLocalState()
    this.logger.info("Switched database", { db: index })
    return true
  }

  /** Drops and reopens the connection, then starts from an empty session. */
  async reconnect(): Promise<void> {
    this.cancelLoads()

    await this.queue.run(async () => {
      await this.deps.source.disconnect()
      await this.deps.source.connect()
    })

    this.clearLocalState()
    this.logger.info("Reconnected")
  }

  /** Picker entries for databases `0..count-1` with their key counts. */
  async databases(count: number = 16): Promise<DatabaseOption[]> {
    const info = await this.exec(() => this.deps.source.keyspaceInfo())

    return Array.from({ length: count }, (_, index) => {
      const keyCount = info.get(index) ?? 0
      return { index, keyCount, label: keyCount > 0 ? `DB ${index} (${keyCount})` : `DB ${index}` }
    })
  }

  serverInfo(): Promise<ServerInfo> {
    return this.exec(() => this.deps.source.serverInfo())
  }

  /**
   * The tree for the cache as it stands: pending virtual keys folded in,
   * then the filter applied to every cached key.
   */
  currentTree(): KeyspaceTree {
    const snapshot = this.cache.snapshot()
    const view = this.overlay.merge(snapshot.pattern, snapshot.keys, snapshot.types)
    const visible = filterKeys(view.keys, this.filterText)
    const root = buildNamespaceTree(visible, view.types, this.separator)

    return { ...root, cursor: snapshot.cursor, hasMore: !isTerminalCursor(snapshot.cursor) }
  }

  private exec<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (!this.deps.source.isConnected()) throw KeyspaceError.notConnected(this.deps.source.label)
      return task()
    })
  }

  private async readValue(key: string, type: KeyType): Promise<KeyValue> {
    const source = this.deps.source

    switch (type) {
      case "string":
        return { kind: "string", value: await source.getString(key) }
      case "list":
        return { kind: "list", value: await source.getList(key) }
      case "hash":
        return { kind: "hash", value: await source.getHash(key) }
      case "set":
        return { kind: "set", value: await source.getSet(key) }
      case "zset":
        return { kind: "zset", value: await source.getZset(key) }
      default:
        return { kind: "none" }
    }
  }

  private confirmResolved(types: ReadonlyMap<string, KeyType>): void {
    if (this.overlay.size === 0) return

    for (const [key, type] of types) {
      if (this.overlay.confirm(key, type)) {
        this.logger.debug("Virtual key confirmed", { key, type })
      }
    }
  }

  private clearLocalState(): void {
    this.cache.reset(this.cache.pattern)
    this.overlay.clear()
    this.loaded = false
  }

  private logFailure(operation: string, err: unknown, meta: Record<string, unknown>): void {
    if (isScanAborted(err)) {
      this.logger.debug(`${operation} aborted`, meta)
    } else if (err instanceof TransportError) {
      this.logger.error(`${operation} failed`, { ...meta, err })
    } else {
      this.logger.warn(`${operation} failed`, { ...meta, err })
    }
  }
}
