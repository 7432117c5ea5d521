import type { ColorRepresentation, Vector2, Vector3 } from 'three'

// ---------------------------------------------------------------------------
// Segmentation tree — the in-memory form of one triangle's paint layout
// ---------------------------------------------------------------------------

/** A sub-triangle painted with a single material. `0` means unpainted. */
export interface LeafNode {
  readonly kind: 'leaf'
  readonly materialIndex: number
}

/** A sub-triangle divided into four, in `[corner0, corner1, corner2, center]` order. */
export interface SplitNode {
  readonly kind: 'split'
  readonly children: readonly [SegmentationNode, SegmentationNode, SegmentationNode, SegmentationNode]
}

export type SegmentationNode = LeafNode | SplitNode

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/**
 * The vector operations the subdivider needs. Both `Vector2` (UV space) and
 * `Vector3` (object space) satisfy it.
 */
export interface FootprintPoint<T> {
  clone(): T
  lerp(v: T, alpha: number): T
  distanceTo(v: T): number
}

/** Three corners in a fixed winding order. Subdivision depends on that order. */
export type Footprint<T extends FootprintPoint<T>> = readonly [T, T, T]

export type UVFootprint = Footprint<Vector2>
export type ObjectFootprint = Footprint<Vector3>

/** Four child footprints in codec child order. */
export type FootprintQuad<T extends FootprintPoint<T>> = readonly [Footprint<T>, Footprint<T>, Footprint<T>, Footprint<T>]

// ---------------------------------------------------------------------------
// Colour
// ---------------------------------------------------------------------------

/** 8-bit RGBA. */
export type Rgba = readonly [number, number, number, number]

/**
 * Material index → colour. Returning `null`/`undefined` means "no colour";
 * the renderer leaves such pixels untouched. Index 0 is reserved for the
 * unpainted base and is never asked to paint.
 */
export type MaterialPalette = (materialIndex: number) => ColorRepresentation | null | undefined
