export type { KeyspaceDataSource, ServerInfo, ZsetEntry } from "./ports/data-source"
export type { KeyDetail, KeyValue } from "./ports/key-detail"
export { keyTypeNames, toKeyType } from "./ports/key-type"
export type { KeyType, ValueKeyType } from "./ports/key-type"
export type { BranchNode, KeyspaceTree, LeafNode, NamespaceNode, NamespaceRoot } from "./ports/namespace-node"
export { isTerminalCursor, TERMINAL_CURSOR } from "./ports/scan-cursor"
export type { ScanCursor } from "./ports/scan-cursor"
export type { ScanPage } from "./ports/scan-page"
export type { DatabaseOption, SessionState } from "./ports/session-state"

export {
  isScanAborted,
  KeyspaceError,
  ResolutionError,
  ScanAbortedError,
  TransportError,
} from "./core/errors/keyspace-errors"
export type { KeyspaceErrorCode } from "./core/errors/keyspace-errors"
export { globMatch } from "./core/glob/glob-match"
export { CursorPaginator } from "./core/pagination/cursor-paginator"
export type { CursorPaginatorDeps, CursorPaginatorOptions } from "./core/pagination/cursor-paginator"
export { TypeBatcher } from "./core/metadata/type-batcher"
export type { TypeBatcherDeps, TypeBatcherOptions } from "./core/metadata/type-batcher"
export { KeyspaceCache } from "./core/cache/keyspace-cache"
export type { KeyspaceSnapshot } from "./core/cache/keyspace-cache"
export { VirtualKeyOverlay } from "./core/overlay/virtual-key-overlay"
export type { OverlayView } from "./core/overlay/virtual-key-overlay"
export { buildNamespaceTree, findNode, selectKey } from "./core/tree/namespace-tree"
export { filterKeys } from "./core/filter/local-filter"
export { formatErrorReply, formatReply, tokenizeCommand } from "./core/commands/format-reply"
export { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, MIN_PAGE_LIMIT, parsePageLimit } from "./core/session/page-limit"
export { isWriteCommand } from "./core/session/write-commands"
export { SerialQueue } from "./core/session/serial-queue"
export { KeyspaceSession } from "./core/session/keyspace-session"
export type { KeyspaceSessionDeps, KeyspaceSessionOptions } from "./core/session/keyspace-session"

export { MemoryKeyspaceDataSource } from "./adapters/memory/memory-data-source"
export type { MemoryDataSourceOptions } from "./adapters/memory/memory-data-source"
export { createRedisClient } from "./adapters/redis/redis-client"
export type { RedisClientConfig, RedisKeyspaceClient } from "./adapters/redis/redis-client"
export { RedisKeyspaceDataSource } from "./adapters/redis/redis-data-source"
export type { RedisDataSourceDeps, RedisDataSourceOptions } from "./adapters/redis/redis-data-source"
export { parseInfo, parseKeyspaceCounts } from "./adapters/redis/parse-info"

export * from "./app/config"
export { createKeyspaceContext } from "./app/create-context"
export type { KeyspaceContext, KeyspaceContextOptions } from "./app/create-context"
