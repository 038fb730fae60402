import { Option } from "effect"
import type { Conversion } from "../../Conversion.js"

/**
 * A conversion edge seen from one of its endpoints. `forward` is true when the
 * edge leaves the endpoint and false when it arrives there.
 */
interface AdjacencyEntry {
  readonly neighbour: string
  readonly edge: Conversion
  readonly forward: boolean
}

/**
 * Best conversion known so far to reach `node`.
 *
 * `conversion` maps the source to `node`, except on the first hop through an
 * incoming edge, where it is that edge unchanged and maps `node` to the
 * source (`reversed`). Folding later hops into it picks one of the four
 * combination operators, so no edge is ever inverted on its own.
 */
interface Label {
  readonly node: string
  readonly conversion: Conversion
  readonly reversed: boolean
  readonly score: number
  readonly path: ReadonlyArray<string>
}

export interface PathResult {
  readonly conversion: Conversion
  readonly path: ReadonlyArray<string>
  readonly hops: number
}

export const buildAdjacency = (
  edges: Iterable<Conversion>,
): ReadonlyMap<string, ReadonlyArray<AdjacencyEntry>> => {
  const adjacency = new Map<string, Array<AdjacencyEntry>>()
  const push = (node: string, entry: AdjacencyEntry) => {
    const entries = adjacency.get(node)
    if (entries) {
      entries.push(entry)
    } else {
      adjacency.set(node, [entry])
    }
  }
  for (const edge of edges) {
    if (edge.srcUnit === edge.destUnit) {
      continue
    }
    push(edge.srcUnit, { neighbour: edge.destUnit, edge, forward: true })
    push(edge.destUnit, { neighbour: edge.srcUnit, edge, forward: false })
  }
  return adjacency
}

const resolved = (label: Pick<Label, "conversion" | "reversed">): Conversion =>
  label.reversed ? label.conversion.invert() : label.conversion

const extend = (label: Label, entry: AdjacencyEntry): Conversion => {
  if (label.reversed) {
    return entry.forward
      ? label.conversion.combineDivergent(entry.edge)
      : label.conversion.combineOpposite(entry.edge)
  }
  return entry.forward
    ? label.conversion.combineSequential(entry.edge)
    : label.conversion.combineConvergent(entry.edge)
}

const comparePaths = (left: ReadonlyArray<string>, right: ReadonlyArray<string>): number => {
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const a = left[i] ?? ""
    const b = right[i] ?? ""
    if (a !== b) {
      return a < b ? -1 : 1
    }
  }
  return left.length - right.length
}

/**
 * Ordering of frontier labels: lower accumulated error first, then fewer
 * hops, then the lexical order of the visited units.
 */
export const compareLabels = (
  left: Pick<Label, "score" | "path">,
  right: Pick<Label, "score" | "path">,
): number => {
  if (left.score !== right.score) {
    return left.score < right.score ? -1 : 1
  }
  if (left.path.length !== right.path.length) {
    return left.path.length - right.path.length
  }
  return comparePaths(left.path, right.path)
}

const takeBest = (frontier: Array<Label>): Label | undefined => {
  let bestIndex = 0
  for (let i = 1; i < frontier.length; i++) {
    const candidate = frontier[i]
    const best = frontier[bestIndex]
    if (candidate !== undefined && best !== undefined && compareLabels(candidate, best) < 0) {
      bestIndex = i
    }
  }
  return frontier.splice(bestIndex, 1)[0]
}

/**
 * Lowest-error conversion from `src` to `dest` over the given edges.
 *
 * Best-first search with lazy deletion: every relaxation pushes a new label
 * and stale ones are skipped once their node is settled. Edges are traversed
 * in either direction. Paths longer than `maxHops` are not explored.
 */
export const findBestPath = (
  edges: Iterable<Conversion>,
  src: string,
  dest: string,
  maxHops: number,
): Option.Option<PathResult> => {
  const adjacency = buildAdjacency(edges)
  if (!adjacency.has(src) || !adjacency.has(dest)) {
    return Option.none()
  }

  const settled = new Set<string>([src])
  const frontier: Array<Label> = []

  for (const entry of adjacency.get(src) ?? []) {
    const reversed = !entry.forward
    frontier.push({
      node: entry.neighbour,
      conversion: entry.edge,
      reversed,
      score: resolved({ conversion: entry.edge, reversed }).totalAbsoluteError,
      path: [src, entry.neighbour],
    })
  }

  for (let label = takeBest(frontier); label !== undefined; label = takeBest(frontier)) {
    if (settled.has(label.node)) {
      continue
    }
    settled.add(label.node)

    if (label.node === dest) {
      return Option.some({ conversion: resolved(label), path: label.path, hops: label.path.length - 1 })
    }
    if (label.path.length - 1 >= maxHops) {
      continue
    }

    for (const entry of adjacency.get(label.node) ?? []) {
      if (settled.has(entry.neighbour)) {
        continue
      }
      const conversion = extend(label, entry)
      frontier.push({
        node: entry.neighbour,
        conversion,
        reversed: false,
        score: conversion.totalAbsoluteError,
        path: [...label.path, entry.neighbour],
      })
    }
  }

  return Option.none()
}
