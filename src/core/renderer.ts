/**
 * Tree renderer — paints decoded segmentation trees into a raster.
 *
 * Painting happens per triangle ({@link PaintSession.paint}); gap filling
 * runs once afterwards ({@link PaintSession.finish}) because it has to see
 * every leaf write of every triangle sharing the raster.
 *
 * @packageDocumentation
 */

import { resolveSegmentationConfig, type SegmentationConfig } from './config'
import { resolvePalette } from './palette'
import type { Raster } from './raster'
import { scanTriangle, toPixelTriangle } from './rasterize'
import { collectLeafFootprints } from './subdivider'
import type { MaterialPalette, Rgba, SegmentationNode, UVFootprint } from './types'

/** Per-pixel coverage written during a paint pass. */
export const Coverage = {
  None: 0,
  /** Inside an unpainted leaf (or a material without a colour); pixel left as it was. */
  Unpainted: 1,
  Painted: 2,
} as const

// ---------------------------------------------------------------------------
// Gap filling
// ---------------------------------------------------------------------------

export interface GapFillOptions {
  /** Ring radius (pixels) searched for a covered neighbour. Default: `2`. */
  searchRadius?: number
  edgeEpsilon?: number
}

/**
 * Give every uncovered pixel inside a root footprint the colour of its
 * nearest covered pixel (square rings outward, first hit in scan order).
 * A nearest neighbour that is covered but unpainted leaves the gap
 * untouched. Only pixels covered during painting act as sources, so the
 * result does not depend on visiting order.
 *
 * @returns Number of pixels recoloured.
 */
export function fillGaps(
  raster: Raster,
  coverage: Uint8Array,
  roots: readonly UVFootprint[],
  options: GapFillOptions = {},
): number {
  const radius = options.searchRadius ?? 2
  const epsilon = options.edgeEpsilon ?? 1e-9
  const { width, height, data } = raster
  const visited = new Uint8Array(width * height)
  let filled = 0

  const nearestCovered = (x: number, y: number): number => {
    for (let r = 1; r <= radius; r++) {
      for (let dy = -r; dy <= r; dy++) {
        const ny = y + dy
        if (ny < 0 || ny >= height) continue
        const step = Math.abs(dy) === r ? 1 : 2 * r
        for (let dx = -r; dx <= r; dx += step) {
          const nx = x + dx
          if (nx < 0 || nx >= width) continue
          const n = ny * width + nx
          if (coverage[n] !== Coverage.None) return n
        }
      }
    }
    return -1
  }

  for (const root of roots) {
    scanTriangle(raster, toPixelTriangle(raster, root), -epsilon, (pixel) => {
      if (coverage[pixel] !== Coverage.None || visited[pixel]) return
      visited[pixel] = 1
      const source = nearestCovered(pixel % width, Math.floor(pixel / width))
      if (source < 0 || coverage[source] !== Coverage.Painted) return
      data.copyWithin(pixel * 4, source * 4, source * 4 + 4)
      filled++
    })
  }

  return filled
}

// ---------------------------------------------------------------------------
// Paint session
// ---------------------------------------------------------------------------

export interface PaintStats {
  leaves: number
  paintedPixels: number
}

/**
 * Paints any number of triangles into one raster, then fills gaps once.
 *
 * @example
 * ```ts
 * const session = new PaintSession(raster, createPalette([null, '#FF0000', '#00FF00', '#0000FF']))
 * for (const { tree, uvs } of triangles) session.paint(tree, uvs)
 * session.finish()
 * ```
 */
export class PaintSession {
  private readonly config: Required<SegmentationConfig>
  private readonly colors: (Rgba | null)[]
  private readonly roots: UVFootprint[] = []
  readonly coverage: Uint8Array
  private finished = false

  constructor(
    readonly raster: Raster,
    palette: MaterialPalette,
    config?: SegmentationConfig,
  ) {
    this.config = resolveSegmentationConfig(config)
    this.colors = resolvePalette(palette)
    this.coverage = new Uint8Array(raster.width * raster.height)
  }

  /**
   * Paint one triangle's tree into its UV footprint. Material 0 (and any
   * index the palette has no colour for) marks pixels covered without
   * changing them.
   *
   * @throws InvalidFootprintError when a split node's footprint is degenerate
   */
  paint(node: SegmentationNode, footprint: UVFootprint): PaintStats {
    if (this.finished) throw new Error('PaintSession already finished')

    const leaves = collectLeafFootprints(node, footprint)
    const { data } = this.raster
    const coverage = this.coverage
    let paintedPixels = 0

    for (const leafFp of leaves) {
      const color = leafFp.materialIndex === 0 ? null : this.colors[leafFp.materialIndex]
      const t = toPixelTriangle(this.raster, leafFp.footprint)
      scanTriangle(this.raster, t, -this.config.edgeEpsilon, (pixel) => {
        if (color) {
          data.set(color, pixel * 4)
          coverage[pixel] = Coverage.Painted
          paintedPixels++
        } else if (coverage[pixel] === Coverage.None) {
          coverage[pixel] = Coverage.Unpainted
        }
      })
    }

    this.roots.push(footprint)
    return { leaves: leaves.length, paintedPixels }
  }

  /**
   * Run the gap-filling pass over every painted triangle. Call it after all
   * `paint` calls; the session cannot be used afterwards.
   *
   * @returns Number of pixels recoloured by gap filling.
   */
  finish(): number {
    if (this.finished) return 0
    this.finished = true
    const filled = fillGaps(this.raster, this.coverage, this.roots, {
      searchRadius: this.config.gapSearchRadius,
      edgeEpsilon: this.config.edgeEpsilon,
    })
    if (filled > 0) this.config.logger.debug(`Gap filling recoloured ${filled} pixel(s)`)
    return filled
  }
}

/**
 * Paint a single triangle and fill its gaps. Painting the same tree into the
 * same raster again changes nothing.
 */
export function paintSegmentation(
  node: SegmentationNode,
  footprint: UVFootprint,
  raster: Raster,
  palette: MaterialPalette,
  config?: SegmentationConfig,
): PaintStats & { gapFilled: number } {
  const session = new PaintSession(raster, palette, config)
  const stats = session.paint(node, footprint)
  return { ...stats, gapFilled: session.finish() }
}
