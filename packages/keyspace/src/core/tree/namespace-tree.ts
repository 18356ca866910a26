import type { KeyType } from "../../ports/key-type"
import type { BranchNode, NamespaceNode, NamespaceRoot } from "../../ports/namespace-node"
import { KeyspaceError } from "../errors/keyspace-errors"

type ArenaEntry = {
  name: string
  path: string
  key?: string
  children: Map<string, ArenaEntry>
}

function byName(a: NamespaceNode, b: NamespaceNode): number {
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

/**
 * Builds the namespace hierarchy for `keys` split on `separator`.
 *
 * Nodes are collected in an arena of segment tries, then materialized
 * bottom-up without recursion, so key depth is bounded only by key length.
 * The result depends only on the set of keys: input order and duplicates do
 * not change it.
 */
export function buildNamespaceTree(
  keys: readonly string[],
  types: ReadonlyMap<string, KeyType>,
  separator: string = ":",
): NamespaceRoot {
  if (separator === "") {
    throw KeyspaceError.invalidArgument("Separator must not be empty", { separator })
  }

  const topLevel = new Map<string, ArenaEntry>()
  let keyCount = 0

  for (const key of keys) {
    let siblings = topLevel
    let entry: ArenaEntry | undefined
    let start = 0

    for (;;) {
      const at = key.indexOf(separator, start)
      const end = at === -1 ? key.length : at
      const segment = key.slice(start, end)

      entry = siblings.get(segment)
      if (!entry) {
        // slices of the key itself, so deep paths share its storage
        entry = { name: segment, path: key.slice(0, end), children: new Map() }
        siblings.set(segment, entry)
      }
      siblings = entry.children

      if (at === -1) break
      start = at + separator.length
    }

    if (entry.key === undefined) keyCount++
    entry.key = key
  }

  // pre-order walk: every parent lands before its descendants
  const order: ArenaEntry[] = []
  const pending = [...topLevel.values()]
  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    order.push(entry)
    for (const child of entry.children.values()) pending.push(child)
  }

  const built = new Map<ArenaEntry, NamespaceNode>()
  const collect = (entries: Map<string, ArenaEntry>): NamespaceNode[] => {
    const nodes: NamespaceNode[] = []
    for (const child of entries.values()) {
      const node = built.get(child)
      if (node) nodes.push(node)
      built.delete(child)
    }
    return nodes.sort(byName)
  }

  for (let i = order.length - 1; i >= 0; i--) {
    const entry = order[i]
    if (!entry) continue

    const type = entry.key === undefined ? undefined : (types.get(entry.key) ?? "unknown")

    if (entry.children.size === 0) {
      built.set(entry, { kind: "leaf", name: entry.name, path: entry.path, key: entry.key ?? entry.path, type: type ?? "unknown" })
      continue
    }

    const children = collect(entry.children)
    const branch: BranchNode = {
      kind: "branch",
      name: entry.name,
      path: entry.path,
      ...(entry.key !== undefined && { key: entry.key }),
      ...(type !== undefined && { type }),
      leafCount: countLeaves(children),
      children,
    }
    built.set(entry, branch)
  }

  const children = collect(topLevel)

  return {
    kind: "root",
    separator,
    leafCount: countLeaves(children),
    keyCount,
    children,
  }
}

function countLeaves(nodes: readonly NamespaceNode[]): number {
  let total = 0
  for (const node of nodes) {
    total += node.kind === "leaf" ? 1 : node.leafCount
  }
  return total
}

/** Looks a node up by its full path, e.g. `"user:profile"`. */
export function findNode(root: NamespaceRoot, path: string): NamespaceNode | undefined {
  let level: readonly NamespaceNode[] = root.children
  let found: NamespaceNode | undefined

  for (const segment of path.split(root.separator)) {
    found = level.find((node) => node.name === segment)
    if (!found) return undefined
    level = found.kind === "branch" ? found.children : []
  }

  return found
}

/**
 * The key a click on `node` opens: leaves and keyed branches yield their key,
 * plain namespace branches yield nothing.
 */
export function selectKey(node: NamespaceNode): string | undefined {
  return node.key
}
