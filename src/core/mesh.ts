/**
 * Mesh-level pipelines: run the renderer, the extractor and the subdivider
 * over every triangle of a `BufferGeometry`.
 *
 * Triangles are addressed by their position in the index (or in the
 * position attribute for non-indexed geometry), matching the order of
 * `<triangle>` elements in a model document.
 *
 * @packageDocumentation
 */

import { BufferAttribute, BufferGeometry, Vector2, Vector3, type InterleavedBufferAttribute } from 'three'
import { decodeSegmentationAttribute, UNPAINTED } from './codec'
import { resolveSegmentationConfig, type SegmentationConfig } from './config'
import { extractSegmentationHex, type ExtractionPrecisionLoss, type ExtractOptions } from './extractor'
import type { Raster } from './raster'
import { PaintSession } from './renderer'
import { buildStateMap } from './stateMap'
import { collectLeafFootprints, InvalidFootprintError, type LeafFootprint } from './subdivider'
import type { MaterialPalette, ObjectFootprint, SegmentationNode, UVFootprint } from './types'

// ---------------------------------------------------------------------------
// Triangle access
// ---------------------------------------------------------------------------

export function triangleCount(geometry: BufferGeometry): number {
  const index = geometry.getIndex()
  return Math.floor((index ? index.count : geometry.getAttribute('position').count) / 3)
}

export function triangleVertices(geometry: BufferGeometry, triangle: number): [number, number, number] {
  const index = geometry.getIndex()
  const base = triangle * 3
  if (!index) return [base, base + 1, base + 2]
  return [index.getX(base), index.getX(base + 1), index.getX(base + 2)]
}

type VertexAttribute = BufferAttribute | InterleavedBufferAttribute

function readVector2(attribute: VertexAttribute, index: number): Vector2 {
  return new Vector2(attribute.getX(index), attribute.getY(index))
}

function readVector3(attribute: VertexAttribute, index: number): Vector3 {
  return new Vector3(attribute.getX(index), attribute.getY(index), attribute.getZ(index))
}

/** The triangle's corners in the `uv` attribute. */
export function uvFootprint(geometry: BufferGeometry, triangle: number): UVFootprint {
  const uv: VertexAttribute | undefined = geometry.getAttribute('uv')
  if (!uv) throw new TypeError('Geometry has no uv attribute')
  const [a, b, c] = triangleVertices(geometry, triangle)
  return [readVector2(uv, a), readVector2(uv, b), readVector2(uv, c)]
}

/** The triangle's corners in object space. */
export function objectFootprint(geometry: BufferGeometry, triangle: number): ObjectFootprint {
  const position = geometry.getAttribute('position')
  const [a, b, c] = triangleVertices(geometry, triangle)
  return [readVector3(position, a), readVector3(position, b), readVector3(position, c)]
}

// ---------------------------------------------------------------------------
// Render (load direction)
// ---------------------------------------------------------------------------

export interface RenderMeshResult {
  /** Triangles whose attribute failed to decode and were painted as unpainted. */
  decodeFailures: number
  /** Triangles skipped because their UV footprint has no area. */
  degenerateTriangles: number
  gapFilled: number
}

/**
 * Paint every triangle's segmentation into `raster`. Triangles without an
 * attribute are unpainted; malformed attributes are logged and treated the
 * same way, so one bad triangle never aborts the mesh.
 */
export function renderMeshSegmentation(
  geometry: BufferGeometry,
  attributes: ReadonlyMap<number, string>,
  raster: Raster,
  palette: MaterialPalette,
  options?: SegmentationConfig,
): RenderMeshResult {
  const config = resolveSegmentationConfig(options)
  const session = new PaintSession(raster, palette, config)
  const count = triangleCount(geometry)
  let decodeFailures = 0
  let degenerateTriangles = 0

  for (let t = 0; t < count; t++) {
    const tree = decodeSegmentationAttribute(attributes.get(t), {
      ...config,
      onMalformed: () => {
        decodeFailures++
      },
    })
    try {
      session.paint(tree, uvFootprint(geometry, t))
    } catch (error) {
      if (!(error instanceof InvalidFootprintError)) throw error
      degenerateTriangles++
      config.logger.debug(`Triangle ${t}: ${error.message}`)
    }
  }

  const gapFilled = session.finish()
  if (decodeFailures > 0 || degenerateTriangles > 0) {
    config.logger.warn(
      `Segmentation render: ${decodeFailures} decode failure(s), ${degenerateTriangles} degenerate triangle(s)`,
    )
  }
  return { decodeFailures, degenerateTriangles, gapFilled }
}

// ---------------------------------------------------------------------------
// Extract (save direction)
// ---------------------------------------------------------------------------

export interface ExtractMeshResult {
  /** Triangle index → hex string, for painted triangles only. */
  segmentation: Map<number, string>
  /** Triangle index → lossy leaves produced for it. */
  precisionLoss: Map<number, ExtractionPrecisionLoss[]>
  degenerateTriangles: number
}

/**
 * Rebuild every triangle's segmentation string from a painted raster.
 * The raster is classified once up front; it must not change until this
 * returns.
 */
export function extractMeshSegmentation(
  geometry: BufferGeometry,
  raster: Raster,
  palette: MaterialPalette,
  options?: ExtractOptions,
): ExtractMeshResult {
  const config = resolveSegmentationConfig(options)
  const map = buildStateMap(raster, palette, config)
  const count = triangleCount(geometry)
  const segmentation = new Map<number, string>()
  const precisionLoss = new Map<number, ExtractionPrecisionLoss[]>()
  let degenerateTriangles = 0

  for (let t = 0; t < count; t++) {
    try {
      const result = extractSegmentationHex(uvFootprint(geometry, t), map, { ...options, ...config })
      if (result.hex !== null) segmentation.set(t, result.hex)
      if (result.precisionLoss.length > 0) precisionLoss.set(t, result.precisionLoss)
    } catch (error) {
      if (!(error instanceof InvalidFootprintError)) throw error
      degenerateTriangles++
      config.logger.debug(`Triangle ${t}: ${error.message}`)
    }
  }

  if (precisionLoss.size > 0) {
    config.logger.warn(
      `Paint detail finer than depth ${config.maxDepth} was merged on ${precisionLoss.size} triangle(s)`,
    )
  }
  return { segmentation, precisionLoss, degenerateTriangles }
}

// ---------------------------------------------------------------------------
// Geometry subdivision
// ---------------------------------------------------------------------------

/**
 * Expand each triangle's tree into its leaf triangles in object space.
 *
 * Returns a non-indexed geometry with one draw group per material index
 * (group `materialIndex` = leaf material), so paint can be shown without a
 * texture. UVs are carried along when the source has them. Triangles
 * missing from `trees` are kept whole and unpainted.
 */
export function subdivideGeometry(geometry: BufferGeometry, trees: ReadonlyMap<number, SegmentationNode>): BufferGeometry {
  const hasUV = geometry.getAttribute('uv') !== undefined
  const buckets: { positions: number[]; uvs: number[] }[] = [0, 1, 2, 3].map(() => ({ positions: [], uvs: [] }))
  const count = triangleCount(geometry)

  for (let t = 0; t < count; t++) {
    const tree = trees.get(t) ?? UNPAINTED
    let leaves: LeafFootprint<Vector3>[]
    let uvLeaves: LeafFootprint<Vector2>[]
    try {
      leaves = collectLeafFootprints(tree, objectFootprint(geometry, t))
      uvLeaves = hasUV ? collectLeafFootprints(tree, uvFootprint(geometry, t)) : []
    } catch (error) {
      if (!(error instanceof InvalidFootprintError)) throw error
      leaves = collectLeafFootprints(UNPAINTED, objectFootprint(geometry, t))
      uvLeaves = hasUV ? collectLeafFootprints(UNPAINTED, uvFootprint(geometry, t)) : []
    }

    leaves.forEach((leafFp, i) => {
      const bucket = buckets[leafFp.materialIndex]
      for (const v of leafFp.footprint) bucket.positions.push(v.x, v.y, v.z)
      const uvLeaf = uvLeaves[i]
      if (uvLeaf) for (const v of uvLeaf.footprint) bucket.uvs.push(v.x, v.y)
    })
  }

  const result = new BufferGeometry()
  const totalVertices = buckets.reduce((sum, bucket) => sum + bucket.positions.length / 3, 0)
  const positions = new Float32Array(totalVertices * 3)
  const uvs = new Float32Array(totalVertices * 2)
  let start = 0
  buckets.forEach((bucket, materialIndex) => {
    const vertexCount = bucket.positions.length / 3
    if (vertexCount === 0) return
    positions.set(bucket.positions, start * 3)
    uvs.set(bucket.uvs, start * 2)
    result.addGroup(start, vertexCount, materialIndex)
    start += vertexCount
  })

  result.setAttribute('position', new BufferAttribute(positions, 3))
  if (hasUV) result.setAttribute('uv', new BufferAttribute(uvs, 2))
  return result
}
