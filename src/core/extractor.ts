/**
 * Tree extractor — rebuilds a triangle's segmentation tree from a painted
 * raster.
 *
 * The raster is classified once into a {@link StateMap}; each triangle then
 * walks the subdivider over it, stopping at uniform regions and falling back
 * to a majority-vote leaf (reported as precision loss) at the depth limit.
 *
 * @packageDocumentation
 */

import { encodeSegmentation, leaf, split } from './codec'
import { resolveSegmentationConfig, type SegmentationConfig } from './config'
import { scanTriangle, toPixelTriangle } from './rasterize'
import type { StateMap } from './stateMap'
import { subdivideFootprint } from './subdivider'
import type { SegmentationNode, UVFootprint } from './types'

/**
 * Non-fatal: the depth limit forced a region with several materials into a
 * single leaf. Boundary detail finer than the deepest level was discarded.
 */
export interface ExtractionPrecisionLoss {
  depth: number
  footprint: UVFootprint
  /** Sample count per material index. */
  counts: readonly number[]
  /** The material the region was collapsed to. */
  materialIndex: number
}

export interface ExtractOptions extends SegmentationConfig {
  /** Called for every lossy leaf, in the order they are produced. */
  onPrecisionLoss?: (loss: ExtractionPrecisionLoss) => void
}

export interface ExtractionResult {
  node: SegmentationNode
  precisionLoss: ExtractionPrecisionLoss[]
}

interface Samples {
  counts: number[]
  distinct: number
}

/**
 * Sample a footprint: every pixel whose centre lies strictly inside it.
 * Pixels on an edge belong to whichever neighbour painted last, so they are
 * left out. A footprint too small to contain a pixel centre is sampled at
 * its centroid and at each corner pulled halfway towards the centroid.
 */
function sampleFootprint(map: StateMap, footprint: UVFootprint, epsilon: number, stopWhenMixed: boolean): Samples {
  const counts = [0, 0, 0, 0]
  let distinct = 0
  const record = (state: number): boolean => {
    if (counts[state]++ === 0) distinct++
    return !(stopWhenMixed && distinct > 1)
  }

  const inside = scanTriangle(map, toPixelTriangle(map, footprint), epsilon, (pixel) => record(map.states[pixel]))
  if (inside > 0) return { counts, distinct }

  const [a, b, c] = footprint
  const cu = (a.x + b.x + c.x) / 3
  const cv = (a.y + b.y + c.y) / 3
  record(map.sample(cu, cv))
  for (const corner of footprint) {
    if (!record(map.sample((corner.x + cu) / 2, (corner.y + cv) / 2))) break
  }
  return { counts, distinct }
}

/** Most-sampled material; exact ties go to the lowest index. */
function majority(counts: readonly number[]): number {
  let best = 0
  for (let i = 1; i < counts.length; i++) {
    if (counts[i] > counts[best]) best = i
  }
  return best
}

/**
 * Reconstruct the segmentation tree for one triangle.
 *
 * Never recurses past `maxDepth`: a region that is still mixed there becomes
 * a majority-vote leaf and an {@link ExtractionPrecisionLoss} is recorded.
 * The state map must not change while this runs.
 *
 * @throws InvalidFootprintError when a mixed footprint is degenerate
 */
export function extractSegmentation(footprint: UVFootprint, map: StateMap, options?: ExtractOptions): ExtractionResult {
  const config = resolveSegmentationConfig(options)
  const precisionLoss: ExtractionPrecisionLoss[] = []

  const visit = (fp: UVFootprint, depth: number): SegmentationNode => {
    const atLimit = depth >= config.maxDepth
    const samples = sampleFootprint(map, fp, config.edgeEpsilon, !atLimit)

    if (samples.distinct <= 1) return leaf(majority(samples.counts))

    if (atLimit) {
      const loss: ExtractionPrecisionLoss = {
        depth,
        footprint: fp,
        counts: samples.counts,
        materialIndex: majority(samples.counts),
      }
      precisionLoss.push(loss)
      options?.onPrecisionLoss?.(loss)
      return leaf(loss.materialIndex)
    }

    const [q0, q1, q2, q3] = subdivideFootprint(fp)
    const children = [visit(q0, depth + 1), visit(q1, depth + 1), visit(q2, depth + 1), visit(q3, depth + 1)] as const
    const [first] = children
    if (first.kind === 'leaf' && children.every((c) => c.kind === 'leaf' && c.materialIndex === first.materialIndex)) {
      return first
    }
    return split(...children)
  }

  return { node: visit(footprint, 0), precisionLoss }
}

/**
 * Extract and encode one triangle. `hex` is `null` for a fully unpainted
 * triangle, which is written as an absent attribute.
 */
export function extractSegmentationHex(
  footprint: UVFootprint,
  map: StateMap,
  options?: ExtractOptions,
): ExtractionResult & { hex: string | null } {
  const result = extractSegmentation(footprint, map, options)
  const { node } = result
  const hex = node.kind === 'leaf' && node.materialIndex === 0 ? null : encodeSegmentation(node, options)
  return { ...result, hex }
}
