import { BaseError } from "@keyscope/errors"
import type { KeyspaceDataSource } from "../../ports/data-source"
import type { KeyType } from "../../ports/key-type"
import { KeyspaceError, ResolutionError } from "../errors/keyspace-errors"

export type TypeBatcherDeps = {
  source: Pick<KeyspaceDataSource, "typeOfMany">
}

export type TypeBatcherOptions = {
  /**
   * Keys per pipelined round trip. The default page of 2000 keys resolves
   * in two.
   *
   * @default 1000
   */
  batchSize: number
}

const defaultOptions: TypeBatcherOptions = { batchSize: 1000 }

export class TypeBatcher {
  constructor(
    private readonly deps: TypeBatcherDeps,
    private readonly opts: TypeBatcherOptions = defaultOptions,
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw KeyspaceError.invalidArgument("batchSize must be a positive integer", {
        batchSize: opts.batchSize,
      })
    }
  }

  /**
   * Resolves the type of every distinct key. All or nothing: one failed
   * lookup rejects the call with `ResolutionError`.
   */
  async resolveTypes(keys: readonly string[]): Promise<Map<string, KeyType>> {
    const out = new Map<string, KeyType>()
    if (keys.length === 0) return out

    const distinct = [...new Set(keys)]

    for (const batch of this.chunks(distinct, this.opts.batchSize)) {
      const types = await this.lookup(batch)

      if (types.length !== batch.length) {
        throw ResolutionError.forKeys(batch)
      }

      for (const [i, key] of batch.entries()) {
        out.set(key, types[i] ?? "unknown")
      }
    }

    return out
  }

  private async lookup(batch: readonly string[]): Promise<KeyType[]> {
    try {
      return await this.deps.source.typeOfMany(batch)
    } catch (err) {
      if (err instanceof BaseError) throw err
      throw ResolutionError.forKeys(batch, err)
    }
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }
}
