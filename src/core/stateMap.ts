import { resolveSegmentationConfig, type SegmentationConfig } from './config'
import { resolvePalette } from './palette'
import type { Raster } from './raster'
import type { PixelGrid } from './rasterize'
import type { MaterialPalette, Rgba } from './types'

/**
 * A raster classified into material indices, one byte per pixel. Built once
 * per extraction so the recursive walk only does array lookups.
 */
export class StateMap implements PixelGrid {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly states: Uint8Array,
    readonly flipY = false,
  ) {
    if (states.length !== width * height) {
      throw new RangeError(`State map holds ${states.length} entries, expected ${width * height}`)
    }
  }

  uvToPixel(u: number, v: number): { x: number; y: number } {
    return { x: u * this.width, y: (this.flipY ? 1 - v : v) * this.height }
  }

  /** Material index of the pixel containing a UV point (clamped to the map). */
  sample(u: number, v: number): number {
    const p = this.uvToPixel(u, v)
    const x = Math.min(this.width - 1, Math.max(0, Math.floor(p.x)))
    const y = Math.min(this.height - 1, Math.max(0, Math.floor(p.y)))
    return this.states[y * this.width + x]
  }

  /** Pixel count per material index. */
  histogram(): number[] {
    const counts = [0, 0, 0, 0]
    for (let i = 0; i < this.states.length; i++) counts[this.states[i]]++
    return counts
  }
}

export type StateMapOptions = Pick<SegmentationConfig, 'colorTolerance'>

function manhattan(data: Uint8ClampedArray, offset: number, color: Rgba): number {
  return Math.abs(data[offset] - color[0]) + Math.abs(data[offset + 1] - color[1]) + Math.abs(data[offset + 2] - color[2])
}

/**
 * Classify every pixel as the nearest palette material (Manhattan RGB
 * distance; palette index 0 is the base colour). Pixels farther than
 * `colorTolerance` from every entry, and pixels with zero alpha, count as
 * unpainted. Results are memoised per RGB value, so cost scales with the
 * number of distinct colours rather than pixels.
 */
export function buildStateMap(raster: Raster, palette: MaterialPalette, options?: StateMapOptions): StateMap {
  const { colorTolerance } = resolveSegmentationConfig(options)
  const entries: { index: number; color: Rgba }[] = []
  resolvePalette(palette).forEach((color, index) => {
    if (color) entries.push({ index, color })
  })

  const { data, width, height } = raster
  const states = new Uint8Array(width * height)
  if (entries.length === 0) return new StateMap(width, height, states, raster.flipY)

  const memo = new Map<number, number>()
  for (let pixel = 0, offset = 0; pixel < states.length; pixel++, offset += 4) {
    if (data[offset + 3] === 0) continue
    const key = (data[offset] << 16) | (data[offset + 1] << 8) | data[offset + 2]
    let state = memo.get(key)
    if (state === undefined) {
      let best = Infinity
      state = 0
      for (const entry of entries) {
        const distance = manhattan(data, offset, entry.color)
        if (distance < best) {
          best = distance
          state = entry.index
        }
      }
      if (best > colorTolerance) state = 0
      memo.set(key, state)
    }
    states[pixel] = state
  }

  return new StateMap(width, height, states, raster.flipY)
}
