import { createConsoleLogger, type SegmentationLogger } from './logger'

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

/** Default bound on recursive subdivision (root = depth 0). */
export const MAX_DEPTH = 8

/** Hard ceiling for `maxDepth`; 4^15 leaves is already far past any texture. */
export const DEPTH_LIMIT = 15

/** Largest material index a leaf nibble can carry. */
export const MAX_MATERIAL_INDEX = 3

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SegmentationConfig {
  /** Deepest level a split may place children on. Default: `8`. */
  maxDepth?: number
  /**
   * Largest Manhattan RGB distance (0–765) at which a pixel still counts as
   * a palette colour during extraction. Default: `48`.
   */
  colorTolerance?: number
  /** Slack for the inclusive point-in-triangle test, in barycentric units. Default: `1e-9`. */
  edgeEpsilon?: number
  /** How far (in pixels) gap filling looks for a covered neighbour. Default: `2`. */
  gapSearchRadius?: number
  /** Where warnings and debug output go. Default: console, debug off. */
  logger?: SegmentationLogger
}

export const DEFAULT_SEGMENTATION_CONFIG: Readonly<Required<SegmentationConfig>> = Object.freeze({
  maxDepth: MAX_DEPTH,
  colorTolerance: 48,
  edgeEpsilon: 1e-9,
  gapSearchRadius: 2,
  logger: createConsoleLogger(),
})

/**
 * Merge overrides over the defaults and validate the result.
 * @throws RangeError when a value is out of range.
 */
export function resolveSegmentationConfig(overrides?: SegmentationConfig): Required<SegmentationConfig> {
  const defaults = DEFAULT_SEGMENTATION_CONFIG
  const config: Required<SegmentationConfig> = {
    maxDepth: overrides?.maxDepth ?? defaults.maxDepth,
    colorTolerance: overrides?.colorTolerance ?? defaults.colorTolerance,
    edgeEpsilon: overrides?.edgeEpsilon ?? defaults.edgeEpsilon,
    gapSearchRadius: overrides?.gapSearchRadius ?? defaults.gapSearchRadius,
    logger: overrides?.logger ?? defaults.logger,
  }

  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0 || config.maxDepth > DEPTH_LIMIT) {
    throw new RangeError(`maxDepth must be an integer in [0, ${DEPTH_LIMIT}], got ${config.maxDepth}`)
  }
  if (!(config.colorTolerance >= 0)) {
    throw new RangeError(`colorTolerance must be >= 0, got ${config.colorTolerance}`)
  }
  if (!(config.edgeEpsilon >= 0)) {
    throw new RangeError(`edgeEpsilon must be >= 0, got ${config.edgeEpsilon}`)
  }
  if (!Number.isInteger(config.gapSearchRadius) || config.gapSearchRadius < 0) {
    throw new RangeError(`gapSearchRadius must be a non-negative integer, got ${config.gapSearchRadius}`)
  }
  return config
}
