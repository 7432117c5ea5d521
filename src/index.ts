/**
 * `paintseg` — per-triangle multi-material paint for 3MF meshes.
 *
 * Converts between the compact hex segmentation strings slicers store on
 * each `<triangle>` and painted textures: decode a string into a
 * subdivision tree and paint it into a raster on load, then rebuild the
 * tree from the raster and encode it again on save.
 *
 * ## Quick Start
 *
 * ### Load
 * ```ts
 * import { Raster, createPalette, renderMeshSegmentation } from 'paintseg'
 *
 * const raster = Raster.filled(1024, 1024, [128, 128, 128, 255])
 * const palette = createPalette(['#808080', '#E53935', '#43A047', '#1E88E5'])
 * renderMeshSegmentation(geometry, attributes, raster, palette)
 * ```
 *
 * ### Save
 * ```ts
 * import { extractMeshSegmentation, patchArchiveSegmentation } from 'paintseg'
 *
 * const { segmentation } = extractMeshSegmentation(geometry, raster, palette)
 * const bytes = await patchArchiveSegmentation(file, [
 *   { path: '3D/3dmodel.model', objectId: 1, segmentation, attributeName: 'mmu_segmentation' },
 * ])
 * ```
 *
 * @packageDocumentation
 */

// ─── Codec ──────────────────────────────────────────────────────────────────
export {
  decodeSegmentation,
  tryDecodeSegmentation,
  decodeSegmentationAttribute,
  encodeSegmentation,
  MalformedSegmentationError,
  leaf,
  split,
  UNPAINTED,
  nodesEqual,
  treeDepth,
  countLeaves,
  materialsUsed,
} from './core/codec'
export type { CodecOptions, DecodeResult, MalformedReason } from './core/codec'

// ─── Subdivision ────────────────────────────────────────────────────────────
export {
  subdivideFootprint,
  collectLeafFootprints,
  footprintArea,
  isDegenerate,
  InvalidFootprintError,
} from './core/subdivider'
export type { LeafFootprint } from './core/subdivider'

// ─── Raster, render & extract ───────────────────────────────────────────────
export { Raster } from './core/raster'
export type { RasterOptions } from './core/raster'
export { scanTriangle, toPixelTriangle } from './core/rasterize'
export type { PixelGrid, PixelTriangle } from './core/rasterize'
export { PaintSession, paintSegmentation, fillGaps, Coverage } from './core/renderer'
export type { PaintStats, GapFillOptions } from './core/renderer'
export { StateMap, buildStateMap } from './core/stateMap'
export type { StateMapOptions } from './core/stateMap'
export { extractSegmentation, extractSegmentationHex } from './core/extractor'
export type { ExtractOptions, ExtractionResult, ExtractionPrecisionLoss } from './core/extractor'

// ─── Meshes ─────────────────────────────────────────────────────────────────
export {
  renderMeshSegmentation,
  extractMeshSegmentation,
  subdivideGeometry,
  triangleCount,
  triangleVertices,
  uvFootprint,
  objectFootprint,
} from './core/mesh'
export type { RenderMeshResult, ExtractMeshResult } from './core/mesh'

// ─── 3MF documents ──────────────────────────────────────────────────────────
export {
  readTriangleSegmentation,
  writeTriangleSegmentation,
  segmentationMap,
  readArchiveSegmentation,
  patchArchiveSegmentation,
  SegmentationDocumentError,
  SEGMENTATION_ATTRIBUTES,
  SLIC3RPE_NAMESPACE,
} from './core/document'
export type {
  ArchiveInput,
  ArchiveSegmentationUpdate,
  SegmentationAttributeName,
  SegmentedObject,
  SegmentedTriangle,
} from './core/document'
export { paintCodeToFilament, filamentToPaintCode, isFlatPaintCode, MAX_PAINT_CODE_FILAMENT } from './core/paintCodes'

// ─── Colours ────────────────────────────────────────────────────────────────
export { createPalette, resolvePalette, toRgba, rgbaToHex, normalizeColor } from './core/palette'

// ─── Configuration & logging ────────────────────────────────────────────────
export {
  DEFAULT_SEGMENTATION_CONFIG,
  resolveSegmentationConfig,
  MAX_DEPTH,
  DEPTH_LIMIT,
  MAX_MATERIAL_INDEX,
} from './core/config'
export type { SegmentationConfig } from './core/config'
export { createConsoleLogger, silentLogger } from './core/logger'
export type { SegmentationLogger } from './core/logger'

// ─── Types ──────────────────────────────────────────────────────────────────
export type {
  SegmentationNode,
  LeafNode,
  SplitNode,
  Footprint,
  FootprintPoint,
  FootprintQuad,
  UVFootprint,
  ObjectFootprint,
  Rgba,
  MaterialPalette,
} from './core/types'
