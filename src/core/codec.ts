/**
 * Hash segmentation codec — converts between a triangle's subdivision tree
 * and its compact hex form.
 *
 * Each hex digit is one node, laid out as `typeBits << 2 | valueBits`:
 *
 * | typeBits | node                     | valueBits          |
 * |----------|--------------------------|--------------------|
 * | `00`     | leaf                     | material index 0–3 |
 * | `01`     | leaf (painted, accepted) | material index 0–3 |
 * | `10`     | split                    | `00`               |
 * | `11`     | reserved                 | —                  |
 *
 * Nodes are written pre-order: a split is followed by its four children,
 * each fully serialized, in `[corner0, corner1, corner2, center]` order.
 *
 * @example
 * ```ts
 * encodeSegmentation(split(leaf(0), leaf(1), leaf(2), leaf(3))) // "80123"
 * decodeSegmentation('1') // { kind: 'leaf', materialIndex: 1 }
 * ```
 *
 * @packageDocumentation
 */

import { MAX_DEPTH, MAX_MATERIAL_INDEX, resolveSegmentationConfig, type SegmentationConfig } from './config'
import type { LeafNode, SegmentationNode, SplitNode } from './types'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type MalformedReason =
  | 'empty'
  | 'invalid-character'
  | 'reserved-nibble'
  | 'invalid-split'
  | 'truncated'
  | 'depth-exceeded'
  | 'trailing-data'

/** Thrown when a segmentation string cannot be decoded (or a tree cannot be encoded). */
export class MalformedSegmentationError extends Error {
  constructor(
    message: string,
    readonly reason: MalformedReason,
    /** Nibble offset at which decoding stopped, or -1 when not applicable. */
    readonly position: number = -1,
  ) {
    super(message)
    this.name = 'MalformedSegmentationError'
  }
}

// ---------------------------------------------------------------------------
// Node constructors
// ---------------------------------------------------------------------------

const TYPE_LEAF = 0b00
const TYPE_LEAF_PAINTED = 0b01
const TYPE_SPLIT = 0b10

const LEAVES: readonly LeafNode[] = Array.from({ length: MAX_MATERIAL_INDEX + 1 }, (_, materialIndex) =>
  Object.freeze({ kind: 'leaf' as const, materialIndex }),
)

/** A leaf painted with `materialIndex` (0–3). Leaves are shared, frozen instances. */
export function leaf(materialIndex: number): LeafNode {
  const node = LEAVES[materialIndex]
  if (!Number.isInteger(materialIndex) || node === undefined) {
    throw new RangeError(`Material index must be an integer in [0, ${MAX_MATERIAL_INDEX}], got ${materialIndex}`)
  }
  return node
}

export function split(
  corner0: SegmentationNode,
  corner1: SegmentationNode,
  corner2: SegmentationNode,
  center: SegmentationNode,
): SplitNode {
  return Object.freeze({
    kind: 'split' as const,
    children: Object.freeze([corner0, corner1, corner2, center] as const),
  })
}

/** The unpainted triangle — what a missing attribute means. */
export const UNPAINTED: LeafNode = leaf(0)

// ---------------------------------------------------------------------------
// Tree queries
// ---------------------------------------------------------------------------

/** Structural equality. */
export function nodesEqual(a: SegmentationNode, b: SegmentationNode): boolean {
  if (a.kind === 'leaf' || b.kind === 'leaf') {
    return a.kind === 'leaf' && b.kind === 'leaf' && a.materialIndex === b.materialIndex
  }
  const other = b.children
  return a.children.every((child, i) => nodesEqual(child, other[i]))
}

/** Depth of the deepest leaf; a lone leaf has depth 0. */
export function treeDepth(node: SegmentationNode): number {
  if (node.kind === 'leaf') return 0
  return 1 + Math.max(...node.children.map(treeDepth))
}

export function countLeaves(node: SegmentationNode): number {
  if (node.kind === 'leaf') return 1
  return node.children.reduce((sum, child) => sum + countLeaves(child), 0)
}

/** Sorted distinct material indices present in the tree. */
export function materialsUsed(node: SegmentationNode): number[] {
  const found = new Set<number>()
  const stack: SegmentationNode[] = [node]
  for (let n = stack.pop(); n; n = stack.pop()) {
    if (n.kind === 'leaf') found.add(n.materialIndex)
    else stack.push(...n.children)
  }
  return [...found].sort((a, b) => a - b)
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

export interface CodecOptions {
  /** Deepest level children may sit on. Default: {@link MAX_DEPTH}. */
  maxDepth?: number
}

function resolveMaxDepth(options?: CodecOptions | SegmentationConfig): number {
  return options?.maxDepth === undefined ? MAX_DEPTH : resolveSegmentationConfig({ maxDepth: options.maxDepth }).maxDepth
}

function nibbleAt(hex: string, i: number): number {
  const ch = hex.charCodeAt(i)
  if (ch >= 48 && ch <= 57) return ch - 48
  if (ch >= 65 && ch <= 70) return ch - 55
  if (ch >= 97 && ch <= 102) return ch - 87
  throw new MalformedSegmentationError(`Invalid hex character '${hex[i]}' at position ${i}`, 'invalid-character', i)
}

interface Frame {
  children: SegmentationNode[]
}

/**
 * Decode a segmentation string into a tree.
 *
 * Single pass over the nibbles with an explicit stack of open splits, so
 * adversarial input can neither overflow the call stack nor allocate more
 * than `4^maxDepth` leaves.
 *
 * @throws MalformedSegmentationError
 */
export function decodeSegmentation(hex: string, options?: CodecOptions): SegmentationNode {
  const maxDepth = resolveMaxDepth(options)
  if (hex.length === 0) {
    throw new MalformedSegmentationError('Segmentation string is empty', 'empty', 0)
  }

  const stack: Frame[] = []
  let root: SegmentationNode | null = null
  let pos = 0

  while (pos < hex.length) {
    const nibble = nibbleAt(hex, pos)
    const typeBits = nibble >> 2
    const valueBits = nibble & 0b11
    let node: SegmentationNode | null = null

    if (typeBits === TYPE_LEAF || typeBits === TYPE_LEAF_PAINTED) {
      node = leaf(valueBits)
    } else if (typeBits === TYPE_SPLIT) {
      if (valueBits !== 0) {
        throw new MalformedSegmentationError(
          `Split nibble '${hex[pos]}' at position ${pos} carries value bits`,
          'invalid-split',
          pos,
        )
      }
      // The split itself sits at depth stack.length; its children one deeper.
      if (stack.length + 1 > maxDepth) {
        throw new MalformedSegmentationError(
          `Split at position ${pos} exceeds maximum depth ${maxDepth}`,
          'depth-exceeded',
          pos,
        )
      }
      stack.push({ children: [] })
    } else {
      throw new MalformedSegmentationError(`Reserved nibble '${hex[pos]}' at position ${pos}`, 'reserved-nibble', pos)
    }
    pos++

    // Attach completed nodes, closing every split that just got its fourth child.
    while (node) {
      const frame = stack[stack.length - 1]
      if (!frame) {
        root = node
        break
      }
      frame.children.push(node)
      if (frame.children.length < 4) break
      stack.pop()
      const [c0, c1, c2, c3] = frame.children
      node = split(c0, c1, c2, c3)
    }

    if (root) break
  }

  if (!root) {
    throw new MalformedSegmentationError(
      `Segmentation string truncated: ${stack.length} split(s) still waiting for children`,
      'truncated',
      pos,
    )
  }
  if (pos < hex.length) {
    throw new MalformedSegmentationError(
      `${hex.length - pos} unused nibble(s) after the root node`,
      'trailing-data',
      pos,
    )
  }
  return root
}

export type DecodeResult =
  | { ok: true; node: SegmentationNode }
  | { ok: false; error: MalformedSegmentationError }

/** Non-throwing variant of {@link decodeSegmentation}. */
export function tryDecodeSegmentation(hex: string, options?: CodecOptions): DecodeResult {
  try {
    return { ok: true, node: decodeSegmentation(hex, options) }
  } catch (error) {
    if (error instanceof MalformedSegmentationError) return { ok: false, error }
    throw error
  }
}

/**
 * Decode a per-triangle attribute value with the document-level fallback:
 * a missing or blank attribute is {@link UNPAINTED}, and a malformed one is
 * reported through `logger.warn` and also treated as unpainted.
 */
export function decodeSegmentationAttribute(
  attribute: string | null | undefined,
  options?: SegmentationConfig & { onMalformed?: (error: MalformedSegmentationError) => void },
): SegmentationNode {
  const value = attribute?.trim()
  if (!value) return UNPAINTED

  const result = tryDecodeSegmentation(value, options)
  if (result.ok) return result.node

  const config = resolveSegmentationConfig(options)
  config.logger.warn(`Malformed segmentation '${truncateForLog(value)}': ${result.error.message}`)
  options?.onMalformed?.(result.error)
  return UNPAINTED
}

function truncateForLog(value: string): string {
  return value.length > 24 ? `${value.slice(0, 24)}…` : value
}

// ---------------------------------------------------------------------------
// Encoder
// ---------------------------------------------------------------------------

const HEX_DIGITS = '0123456789ABCDEF'

/**
 * Encode a tree as its hex string (uppercase, one digit per node).
 *
 * @throws RangeError for a leaf outside 0–3
 * @throws MalformedSegmentationError with reason `depth-exceeded` for trees deeper than `maxDepth`
 */
export function encodeSegmentation(node: SegmentationNode, options?: CodecOptions): string {
  const maxDepth = resolveMaxDepth(options)
  let out = ''
  const stack: { node: SegmentationNode; depth: number }[] = [{ node, depth: 0 }]

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const current = entry.node
    if (current.kind === 'leaf') {
      leaf(current.materialIndex)
      out += HEX_DIGITS[current.materialIndex]
      continue
    }
    if (entry.depth + 1 > maxDepth) {
      throw new MalformedSegmentationError(
        `Tree is deeper than maximum depth ${maxDepth}`,
        'depth-exceeded',
      )
    }
    out += HEX_DIGITS[TYPE_SPLIT << 2]
    // Push in reverse so child 0 is emitted first.
    for (let i = 3; i >= 0; i--) stack.push({ node: current.children[i], depth: entry.depth + 1 })
  }

  return out
}
