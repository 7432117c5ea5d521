import { DataTexture, RGBAFormat, UnsignedByteType } from 'three'
import type { Rgba } from './types'

export interface RasterOptions {
  /**
   * Put row 0 at the top of UV space (`v = 1`) instead of the bottom.
   * Use it for image data stored top-down. Default: `false`.
   */
  flipY?: boolean
}

/**
 * An RGBA8 pixel grid addressed by UV coordinates.
 *
 * Pixel `(x, y)` samples UV `((x + 0.5) / width, (y + 0.5) / height)`,
 * with `v` mirrored when `flipY` is set. The buffer is borrowed: a raster
 * built from existing data writes straight into it.
 */
export class Raster {
  readonly data: Uint8ClampedArray
  readonly flipY: boolean

  constructor(
    readonly width: number,
    readonly height: number,
    data?: Uint8ClampedArray,
    options: RasterOptions = {},
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Raster size must be positive integers, got ${width}x${height}`)
    }
    const byteLength = width * height * 4
    if (data && data.length !== byteLength) {
      throw new RangeError(`Raster buffer holds ${data.length} bytes, expected ${byteLength}`)
    }
    this.data = data ?? new Uint8ClampedArray(byteLength)
    this.flipY = options.flipY ?? false
  }

  /** Wrap a `DataTexture` holding RGBA bytes. Pixels are shared, not copied. */
  static fromDataTexture(texture: DataTexture): Raster {
    const { width, height } = texture.image
    // Typed as clamped, but callers routinely hand three a plain Uint8Array.
    const data: ArrayBufferView = texture.image.data
    if (texture.format !== RGBAFormat || texture.type !== UnsignedByteType) {
      throw new TypeError('Only RGBA / UnsignedByte textures can back a raster')
    }
    if (data instanceof Uint8ClampedArray) {
      return new Raster(width, height, data, { flipY: texture.flipY })
    }
    if (data instanceof Uint8Array) {
      return new Raster(width, height, new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength), {
        flipY: texture.flipY,
      })
    }
    throw new TypeError('DataTexture pixel data must be a Uint8Array or Uint8ClampedArray')
  }

  /** Create a filled raster. */
  static filled(width: number, height: number, color: Rgba, options?: RasterOptions): Raster {
    const raster = new Raster(width, height, undefined, options)
    raster.fill(color)
    return raster
  }

  /** A `DataTexture` sharing this raster's pixels. */
  toDataTexture(): DataTexture {
    const texture = new DataTexture(null, this.width, this.height, RGBAFormat, UnsignedByteType)
    texture.image = { data: this.data, width: this.width, height: this.height }
    texture.flipY = this.flipY
    texture.needsUpdate = true
    return texture
  }

  clone(): Raster {
    return new Raster(this.width, this.height, this.data.slice(), { flipY: this.flipY })
  }

  fill(color: Rgba): void {
    for (let i = 0; i < this.data.length; i += 4) this.data.set(color, i)
  }

  /** UV → continuous pixel coordinates (pixel centres sit at `.5`). */
  uvToPixel(u: number, v: number): { x: number; y: number } {
    return { x: u * this.width, y: (this.flipY ? 1 - v : v) * this.height }
  }

  /** UV coordinate of a pixel's sample point. */
  pixelToUV(x: number, y: number): { u: number; v: number } {
    const v = (y + 0.5) / this.height
    return { u: (x + 0.5) / this.width, v: this.flipY ? 1 - v : v }
  }

  /** Index of the pixel containing a UV point, clamped to the raster. */
  pixelIndexAt(u: number, v: number): number {
    const p = this.uvToPixel(u, v)
    const x = Math.min(this.width - 1, Math.max(0, Math.floor(p.x)))
    const y = Math.min(this.height - 1, Math.max(0, Math.floor(p.y)))
    return y * this.width + x
  }

  getPixel(x: number, y: number): Rgba {
    const o = (y * this.width + x) * 4
    return [this.data[o], this.data[o + 1], this.data[o + 2], this.data[o + 3]]
  }

  setPixel(x: number, y: number, color: Rgba): void {
    this.data.set(color, (y * this.width + x) * 4)
  }
}
