import type { KeyType } from "./key-type"
import type { ScanCursor } from "./scan-cursor"

/** A real key with no descendants. */
export type LeafNode = {
  readonly kind: "leaf"
  readonly name: string
  readonly path: string
  readonly key: string
  readonly type: KeyType
}

/**
 * A namespace prefix. When the prefix is itself a key, `key` and `type` are
 * set and the branch is selectable.
 */
export type BranchNode = {
  readonly kind: "branch"
  readonly name: string
  readonly path: string
  readonly key?: string
  readonly type?: KeyType
  /** Number of leaf descendants; keyed branches are not counted. */
  readonly leafCount: number
  readonly children: readonly NamespaceNode[]
}

export type NamespaceNode = LeafNode | BranchNode

export type NamespaceRoot = {
  readonly kind: "root"
  readonly separator: string
  readonly leafCount: number
  /** Distinct keys in the tree, keyed branches included. */
  readonly keyCount: number
  readonly children: readonly NamespaceNode[]
}

/** Root as handed to a renderer: the tree plus pagination state. */
export type KeyspaceTree = NamespaceRoot & {
  readonly cursor: ScanCursor
  readonly hasMore: boolean
}
