import type { Footprint, FootprintPoint, FootprintQuad, SegmentationNode } from './types'

/** Thrown when a footprint has no area (or a non-finite corner) and cannot be subdivided. */
export class InvalidFootprintError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidFootprintError'
  }
}

/**
 * Triangle area from its edge lengths (Kahan's stable form of Heron's
 * formula), so the same code serves UV and object space.
 */
export function footprintArea<T extends FootprintPoint<T>>([v0, v1, v2]: Footprint<T>): number {
  const sides = [v0.distanceTo(v1), v1.distanceTo(v2), v2.distanceTo(v0)].sort((x, y) => y - x)
  const [a, b, c] = sides
  const product = (a + (b + c)) * (c - (a - b)) * (c + (a - b)) * (a + (b - c))
  return product > 0 ? Math.sqrt(product) / 4 : 0
}

/**
 * Whether the footprint is too thin to subdivide: non-finite, or an area
 * that is zero relative to its longest edge.
 */
export function isDegenerate<T extends FootprintPoint<T>>(footprint: Footprint<T>): boolean {
  const [v0, v1, v2] = footprint
  const longest = Math.max(v0.distanceTo(v1), v1.distanceTo(v2), v2.distanceTo(v0))
  if (!Number.isFinite(longest) || longest === 0) return true
  return footprintArea(footprint) <= 1e-12 * longest * longest
}

function midpoint<T extends FootprintPoint<T>>(a: T, b: T): T {
  return a.clone().lerp(b, 0.5)
}

/**
 * Split a footprint into its four children, in codec child order:
 *
 * - corner0 `[v0, m01, m20]`
 * - corner1 `[v1, m12, m01]`
 * - corner2 `[v2, m20, m12]`
 * - center  `[m01, m12, m20]`
 *
 * The input points are not modified.
 *
 * @throws InvalidFootprintError for a degenerate footprint
 */
export function subdivideFootprint<T extends FootprintPoint<T>>(footprint: Footprint<T>): FootprintQuad<T> {
  if (isDegenerate(footprint)) {
    throw new InvalidFootprintError('Cannot subdivide a footprint with zero area')
  }
  const [v0, v1, v2] = footprint
  const m01 = midpoint(v0, v1)
  const m12 = midpoint(v1, v2)
  const m20 = midpoint(v2, v0)
  return [
    [v0, m01, m20],
    [v1, m12, m01],
    [v2, m20, m12],
    [m01, m12, m20],
  ]
}

export interface LeafFootprint<T extends FootprintPoint<T>> {
  footprint: Footprint<T>
  materialIndex: number
  depth: number
}

/**
 * Walk a tree and the subdivider in lockstep, returning every leaf's
 * footprint. Leaves come out in pre-order, the same order the codec uses.
 */
export function collectLeafFootprints<T extends FootprintPoint<T>>(
  node: SegmentationNode,
  footprint: Footprint<T>,
): LeafFootprint<T>[] {
  const leaves: LeafFootprint<T>[] = []
  const visit = (current: SegmentationNode, fp: Footprint<T>, depth: number): void => {
    if (current.kind === 'leaf') {
      leaves.push({ footprint: fp, materialIndex: current.materialIndex, depth })
      return
    }
    const quads = subdivideFootprint(fp)
    current.children.forEach((child, i) => visit(child, quads[i], depth + 1))
  }
  visit(node, footprint, 0)
  return leaves
}
