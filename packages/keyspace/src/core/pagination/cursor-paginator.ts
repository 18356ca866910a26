import { type Logger, NullLogger } from "@keyscope/logger"
import type { KeyspaceDataSource } from "../../ports/data-source"
import { isTerminalCursor, type ScanCursor } from "../../ports/scan-cursor"
import type { ScanPage } from "../../ports/scan-page"
import { KeyspaceError, ScanAbortedError } from "../errors/keyspace-errors"

export type CursorPaginatorDeps = {
  source: Pick<KeyspaceDataSource, "scan">
  logger?: Logger
}

export type CursorPaginatorOptions = {
  /**
   * Smallest COUNT hint sent to the store. Keeps the last round trips of a
   * page from asking for one or two keys at a time.
   *
   * @default 10
   */
  floorCount: number
}

const defaultOptions: CursorPaginatorOptions = { floorCount: 10 }

/**
 * Drives the store's incremental scan until at least `minCount` keys are
 * collected or the scan completes.
 *
 * The store treats COUNT as a hint and may return fewer keys, or none, per
 * call. Keys are passed through as returned; deduplication happens in the
 * cache.
 */
export class CursorPaginator {
  private readonly logger: Logger

  constructor(
    private readonly deps: CursorPaginatorDeps,
    private readonly opts: CursorPaginatorOptions = defaultOptions,
  ) {
    if (!Number.isInteger(opts.floorCount) || opts.floorCount < 1) {
      throw KeyspaceError.invalidArgument("floorCount must be a positive integer", {
        floorCount: opts.floorCount,
      })
    }

    this.logger = (deps.logger ?? new NullLogger()).child({ module: "cursor-paginator" })
  }

  async fetch(cursor: ScanCursor, pattern: string, minCount: number, signal?: AbortSignal): Promise<ScanPage> {
    if (!Number.isInteger(minCount) || minCount < 1) {
      throw KeyspaceError.invalidArgument("minCount must be a positive integer", { minCount })
    }

    const keys: string[] = []
    let next = cursor
    let roundTrips = 0

    do {
      if (signal?.aborted) throw ScanAbortedError.create(pattern, next)

      const count = Math.max(minCount - keys.length, this.opts.floorCount)
      const page = await this.deps.source.scan(next, pattern, count)

      for (const key of page.keys) keys.push(key)
      next = page.cursor
      roundTrips++
    } while (keys.length < minCount && !isTerminalCursor(next))

    if (signal?.aborted) throw ScanAbortedError.create(pattern, next)

    this.logger.debug("Scan page collected", { pattern, cursor: next, count: keys.length, roundTrips })

    return { cursor: next, keys }
  }
}
