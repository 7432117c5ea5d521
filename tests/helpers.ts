import { leaf, split } from '../src/core/codec'
import { MAX_MATERIAL_INDEX } from '../src/core/config'
import type { SegmentationNode } from '../src/core/types'

export type Random = () => number

/** Seeded generator (mulberry32) so failures reproduce. Values in [0, 1). */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomInt(random: Random, maxInclusive: number): number {
  return Math.floor(random() * (maxInclusive + 1))
}

export function randomLeaf(random: Random): SegmentationNode {
  return leaf(randomInt(random, MAX_MATERIAL_INDEX))
}

/** A tree no deeper than `maxDepth`, splitting each node with probability `splitChance`. */
export function randomTree(random: Random, maxDepth: number, splitChance = 0.6, depth = 0): SegmentationNode {
  if (depth >= maxDepth || random() >= splitChance) return randomLeaf(random)
  const child = () => randomTree(random, maxDepth, splitChance, depth + 1)
  return split(child(), child(), child(), child())
}

/** A tree whose deepest leaf sits exactly at `depth`, down a random path. */
export function spineTree(random: Random, depth: number): SegmentationNode {
  if (depth === 0) return randomLeaf(random)
  const deep = randomInt(random, 3)
  const children = [0, 1, 2, 3].map((i) => (i === deep ? spineTree(random, depth - 1) : randomLeaf(random)))
  return split(children[0], children[1], children[2], children[3])
}

/** Collapse every split whose four children are the same leaf. */
export function normalizeTree(node: SegmentationNode): SegmentationNode {
  if (node.kind === 'leaf') return node
  const [c0, c1, c2, c3] = node.children.map(normalizeTree)
  if (c0.kind === 'leaf' && [c1, c2, c3].every((c) => c.kind === 'leaf' && c.materialIndex === c0.materialIndex)) {
    return c0
  }
  return split(c0, c1, c2, c3)
}

export function countNodes(node: SegmentationNode): number {
  if (node.kind === 'leaf') return 1
  return 1 + node.children.reduce((sum, child) => sum + countNodes(child), 0)
}
