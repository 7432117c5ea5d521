import type { UVFootprint } from './types'

/** Anything that maps UV to continuous pixel coordinates (pixel centres at `.5`). */
export interface PixelGrid {
  readonly width: number
  readonly height: number
  uvToPixel(u: number, v: number): { x: number; y: number }
}

export interface PixelTriangle {
  x0: number
  y0: number
  x1: number
  y1: number
  x2: number
  y2: number
  /** Twice the signed area in pixel units. */
  area2: number
}

export function toPixelTriangle(grid: PixelGrid, [a, b, c]: UVFootprint): PixelTriangle {
  const p0 = grid.uvToPixel(a.x, a.y)
  const p1 = grid.uvToPixel(b.x, b.y)
  const p2 = grid.uvToPixel(c.x, c.y)
  return {
    x0: p0.x,
    y0: p0.y,
    x1: p1.x,
    y1: p1.y,
    x2: p2.x,
    y2: p2.y,
    area2: (p1.x - p0.x) * (p2.y - p0.y) - (p2.x - p0.x) * (p1.y - p0.y),
  }
}

/**
 * Visit the pixels whose centres have every barycentric weight
 * `>= minWeight`. A small negative `minWeight` includes edges, a small
 * positive one keeps strictly interior pixels only. Returning `false` from
 * `visit` stops the scan.
 *
 * @returns Number of pixels visited.
 */
export function scanTriangle(
  grid: PixelGrid,
  t: PixelTriangle,
  minWeight: number,
  visit: (pixel: number) => boolean | void,
): number {
  if (t.area2 === 0 || !Number.isFinite(t.area2)) return 0

  const minX = Math.max(0, Math.floor(Math.min(t.x0, t.x1, t.x2) - 0.5))
  const maxX = Math.min(grid.width - 1, Math.ceil(Math.max(t.x0, t.x1, t.x2) - 0.5))
  const minY = Math.max(0, Math.floor(Math.min(t.y0, t.y1, t.y2) - 0.5))
  const maxY = Math.min(grid.height - 1, Math.ceil(Math.max(t.y0, t.y1, t.y2) - 0.5))
  const inv = 1 / t.area2
  let count = 0

  for (let y = minY; y <= maxY; y++) {
    const py = y + 0.5
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5
      const w0 = ((t.x1 - px) * (t.y2 - py) - (t.x2 - px) * (t.y1 - py)) * inv
      if (w0 < minWeight) continue
      const w1 = ((t.x2 - px) * (t.y0 - py) - (t.x0 - px) * (t.y2 - py)) * inv
      if (w1 < minWeight) continue
      if (1 - w0 - w1 < minWeight) continue
      count++
      if (visit(y * grid.width + x) === false) return count
    }
  }
  return count
}
