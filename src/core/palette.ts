import { Color, type ColorRepresentation } from 'three'
import { MAX_MATERIAL_INDEX } from './config'
import type { MaterialPalette, Rgba } from './types'

// ---------------------------------------------------------------------------
// Colour helpers
// ---------------------------------------------------------------------------

/** Normalize a colour string to uppercase #RRGGBB (alpha stripped, `#` added). */
export function normalizeColor(color: string): string {
  if (!color || color.trim() === '') return '#808080'
  let c = color.trim()
  if (!c.startsWith('#')) c = '#' + c
  if (c.length === 4) c = `#${c[1]}${c[1]}${c[2]}${c[2]}${c[3]}${c[3]}`
  if (c.length === 9) c = c.substring(0, 7)
  return c.toUpperCase()
}

/**
 * Resolve any colour `three` understands (hex number, `#RRGGBB`, CSS name,
 * `Color`) to opaque 8-bit sRGB. Hex strings with an alpha suffix
 * (`#RRGGBBAA`, as slicers write them) are accepted; the alpha is dropped.
 */
export function toRgba(color: ColorRepresentation): Rgba {
  const resolved =
    typeof color === 'string' && /^#?[0-9a-f]{3}([0-9a-f]{3})?([0-9a-f]{2})?$/i.test(color.trim())
      ? new Color(normalizeColor(color))
      : new Color(color)
  const hex = resolved.getHex()
  return [(hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff, 255]
}

export function rgbaToHex([r, g, b]: Rgba): string {
  return '#' + ((r << 16) | (g << 8) | b).toString(16).padStart(6, '0').toUpperCase()
}

// ---------------------------------------------------------------------------
// Palettes
// ---------------------------------------------------------------------------

/**
 * Build a palette from a colour list.
 *
 * `colors[0]` is the base (unpainted) colour and is only used by extraction
 * to recognise unpainted pixels; `colors[1..3]` are the paint materials.
 * Missing or `null` entries mean "no colour" for that index.
 *
 * @example
 * ```ts
 * const palette = createPalette(['#808080', '#FF0000', '#00FF00', '#0000FF'])
 * palette(1) // '#FF0000'
 * ```
 */
export function createPalette(colors: readonly (ColorRepresentation | null | undefined)[]): MaterialPalette {
  const table = colors.slice(0, MAX_MATERIAL_INDEX + 1)
  return (materialIndex) => table[materialIndex] ?? null
}

/**
 * Resolve a palette into a fixed RGBA table indexed by material, `null`
 * where the palette has no colour. Done once per render/extract so the
 * per-pixel loops never touch `Color`.
 */
export function resolvePalette(palette: MaterialPalette): (Rgba | null)[] {
  const table: (Rgba | null)[] = []
  for (let index = 0; index <= MAX_MATERIAL_INDEX; index++) {
    const color = palette(index)
    table.push(color === null || color === undefined ? null : toRgba(color))
  }
  return table
}
