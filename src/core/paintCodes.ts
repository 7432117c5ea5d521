/**
 * Flat per-triangle `paint_color` codes.
 *
 * One slicer family writes a single short code per triangle instead of a
 * subdivision tree. It is a lookup from code to 1-based filament number and
 * has nothing to do with the tree codec; it lives here so callers reading
 * those files do not have to guess which scheme an attribute uses.
 */

const FILAMENT_CODES: readonly string[] = [
  '', '4', '8', '0C', '1C', '2C', '3C', '4C', '5C', '6C',
  '7C', '8C', '9C', 'AC', 'BC', 'CC', 'DC', 'EC', '0FC', '1FC',
  '2FC', '3FC', '4FC', '5FC', '6FC', '7FC', '8FC', '9FC', 'AFC', 'BFC',
]

const CODE_TO_FILAMENT = new Map(FILAMENT_CODES.map((code, filament) => [code, filament]))

/** Highest filament number with a flat code. */
export const MAX_PAINT_CODE_FILAMENT = FILAMENT_CODES.length - 1

/**
 * Filament number for a flat paint code (case-insensitive), or `0` when the
 * code is empty or unknown.
 */
export function paintCodeToFilament(code: string | null | undefined): number {
  if (!code) return 0
  return CODE_TO_FILAMENT.get(code.trim().toUpperCase()) ?? 0
}

/**
 * Flat paint code for a filament number; `0` (default filament) gives the
 * empty string.
 * @throws RangeError outside `0..MAX_PAINT_CODE_FILAMENT`
 */
export function filamentToPaintCode(filament: number): string {
  const code = FILAMENT_CODES[filament]
  if (!Number.isInteger(filament) || code === undefined) {
    throw new RangeError(`No paint code for filament ${filament}`)
  }
  return code
}

/** Whether an attribute value is one of the flat codes (rather than a tree). */
export function isFlatPaintCode(value: string): boolean {
  const normalized = value.trim().toUpperCase()
  return normalized !== '' && CODE_TO_FILAMENT.has(normalized)
}
