/**
 * Per-triangle segmentation attributes in 3MF model parts.
 *
 * ★ Only the segmentation attributes on `<triangle>` tags are read or
 *   touched. No DOM parsing or re-serialization: every other byte of the
 *   model part, and every other entry of the archive, is preserved as-is.
 *
 * @packageDocumentation
 */

import JSZip from 'jszip'
import { encodeSegmentation, leaf } from './codec'
import { MAX_MATERIAL_INDEX, resolveSegmentationConfig, type SegmentationConfig } from './config'
import { isFlatPaintCode, paintCodeToFilament } from './paintCodes'

// ---------------------------------------------------------------------------
// Errors & constants
// ---------------------------------------------------------------------------

/** Thrown when a model part or archive cannot be read or patched. */
export class SegmentationDocumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SegmentationDocumentError'
  }
}

export const SLIC3RPE_NAMESPACE = 'http://schemas.slic3r.org/3mf/2017/06'

/** Attribute names that carry a segmentation string, in lookup priority order. */
export const SEGMENTATION_ATTRIBUTES = ['slic3rpe:mmu_segmentation', 'mmu_segmentation', 'paint_color'] as const

export type SegmentationAttributeName = (typeof SEGMENTATION_ATTRIBUTES)[number]

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SegmentedTriangle {
  v1: number
  v2: number
  v3: number
  /** Raw attribute value, when the triangle carries one. */
  segmentation?: string
  /** Which attribute the value came from. */
  attributeName?: string
  /** Filament number, when the value is a flat `paint_color` code rather than a tree. */
  filament?: number
}

export interface SegmentedObject {
  id: number
  name?: string
  vertexCount: number
  triangles: SegmentedTriangle[]
}

// ---------------------------------------------------------------------------
// Tag helpers
// ---------------------------------------------------------------------------

const OBJECT_PATTERN = /<((?:[\w.-]+:)?object)\b([^>]*?)(?<!\/)>([\s\S]*?)<\/\1>/gi
const TRIANGLE_PATTERN = /<(?:[\w.-]+:)?triangle\b[^>]*>/gi
const VERTEX_PATTERN = /<(?:[\w.-]+:)?vertex\b/gi
const ATTRIBUTE_PATTERN = /([\w.:-]+)\s*=\s*(["'])(.*?)\2/g

function readAttributes(tag: string): Map<string, string> {
  const attrs = new Map<string, string>()
  for (const match of tag.matchAll(ATTRIBUTE_PATTERN)) {
    attrs.set(match[1], match[3])
  }
  return attrs
}

function findSegmentation(attrs: Map<string, string>): { name: string; value: string } | null {
  for (const name of SEGMENTATION_ATTRIBUTES) {
    const value = attrs.get(name)
    if (value !== undefined) return { name, value }
  }
  // Any other prefix bound to the same local names.
  for (const [name, value] of attrs) {
    const lower = name.toLowerCase()
    if (lower.endsWith(':mmu_segmentation') || lower.endsWith(':paint_color')) return { name, value }
  }
  return null
}

function isSegmentationAttribute(name: string): boolean {
  const lower = name.toLowerCase()
  return (
    lower === 'mmu_segmentation' ||
    lower === 'paint_color' ||
    lower.endsWith(':mmu_segmentation') ||
    lower.endsWith(':paint_color')
  )
}

function isPaintColorAttribute(name: string): boolean {
  const lower = name.toLowerCase()
  return lower === 'paint_color' || lower.endsWith(':paint_color')
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;')
}

// ---------------------------------------------------------------------------
// Model part I/O
// ---------------------------------------------------------------------------

/**
 * List every mesh object in a model part with its triangles' segmentation
 * attributes. Triangles keep document order, so their array index is the
 * triangle index the mesh pipelines use.
 */
export function readTriangleSegmentation(modelXml: string): SegmentedObject[] {
  const objects: SegmentedObject[] = []

  for (const match of modelXml.matchAll(OBJECT_PATTERN)) {
    const attrs = readAttributes(match[2])
    const body = match[3]
    const id = parseInt(attrs.get('id') ?? '', 10)
    if (Number.isNaN(id)) continue

    const triangles: SegmentedTriangle[] = []
    for (const tagMatch of body.matchAll(TRIANGLE_PATTERN)) {
      const tri = readAttributes(tagMatch[0])
      const triangle: SegmentedTriangle = {
        v1: parseInt(tri.get('v1') ?? '0', 10),
        v2: parseInt(tri.get('v2') ?? '0', 10),
        v3: parseInt(tri.get('v3') ?? '0', 10),
      }
      const seg = findSegmentation(tri)
      if (seg) {
        triangle.segmentation = seg.value
        triangle.attributeName = seg.name
        if (isPaintColorAttribute(seg.name) && isFlatPaintCode(seg.value)) {
          triangle.filament = paintCodeToFilament(seg.value)
        }
      }
      triangles.push(triangle)
    }

    objects.push({
      id,
      name: attrs.get('name'),
      vertexCount: body.match(VERTEX_PATTERN)?.length ?? 0,
      triangles,
    })
  }

  return objects
}

/**
 * Segmentation strings of one object as a triangle-index map, ready for
 * `renderMeshSegmentation`. Unpainted triangles are omitted.
 *
 * Flat `paint_color` codes become single-leaf strings for their filament.
 * Filaments above {@link MAX_MATERIAL_INDEX} have no leaf; those triangles
 * are left out and reported through `logger.warn`.
 */
export function segmentationMap(object: SegmentedObject, options?: SegmentationConfig): Map<number, string> {
  const map = new Map<number, string>()
  let unmapped = 0

  object.triangles.forEach((triangle, index) => {
    if (triangle.filament !== undefined) {
      if (triangle.filament > MAX_MATERIAL_INDEX) unmapped++
      else if (triangle.filament > 0) map.set(index, encodeSegmentation(leaf(triangle.filament)))
      return
    }
    if (triangle.segmentation) map.set(index, triangle.segmentation)
  })

  if (unmapped > 0) {
    resolveSegmentationConfig(options).logger.warn(
      `Object ${object.id}: ${unmapped} triangle(s) painted with filaments above ${MAX_MATERIAL_INDEX} left unpainted`,
    )
  }
  return map
}

/**
 * Rewrite the segmentation attributes of one object's triangles.
 *
 * Every `<triangle>` of the object loses its existing segmentation
 * attributes; those with an entry in `segmentation` get `attributeName`
 * set to it. The `slic3rpe` namespace is declared on `<model>` when needed.
 *
 * Values are written verbatim, in this library's nibble layout. Slicers
 * that use their own layout under the same attribute name will read them
 * differently, so there is no default name.
 *
 * @throws SegmentationDocumentError when the object does not exist
 */
export function writeTriangleSegmentation(
  modelXml: string,
  objectId: number,
  segmentation: ReadonlyMap<number, string>,
  attributeName: SegmentationAttributeName,
): string {
  let found = false

  let result = modelXml.replace(OBJECT_PATTERN, (whole: string, tag: string, attrText: string, body: string) => {
    if (parseInt(readAttributes(attrText).get('id') ?? '', 10) !== objectId) return whole
    found = true

    let triangleIndex = 0
    const patchedBody = body.replace(TRIANGLE_PATTERN, (triangleTag: string) => {
      const value = segmentation.get(triangleIndex++)
      let patched = triangleTag.replace(/\s+([\w.:-]+)\s*=\s*(["'])(.*?)\2/g, (attr: string, name: string) =>
        isSegmentationAttribute(name) ? '' : attr,
      )
      if (value !== undefined) {
        const close = patched.endsWith('/>') ? '/>' : '>'
        patched = `${patched.slice(0, -close.length).trimEnd()} ${attributeName}="${escapeAttribute(value)}"${close}`
      }
      return patched
    })
    return `<${tag}${attrText}>${patchedBody}</${tag}>`
  })

  if (!found) throw new SegmentationDocumentError(`Object ${objectId} not found in model`)

  if (attributeName.startsWith('slic3rpe:') && segmentation.size > 0 && !/xmlns:slic3rpe\s*=/.test(result)) {
    result = result.replace(/<((?:[\w.-]+:)?model)\b/, (open: string) => `${open} xmlns:slic3rpe="${SLIC3RPE_NAMESPACE}"`)
  }
  return result
}

// ---------------------------------------------------------------------------
// Archive I/O
// ---------------------------------------------------------------------------

export type ArchiveInput = ArrayBuffer | Uint8Array | Blob

function isModelPart(path: string): boolean {
  return path.startsWith('3D/') && path.endsWith('.model')
}

async function openArchive(data: ArchiveInput): Promise<JSZip> {
  try {
    return await new JSZip().loadAsync(data)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new SegmentationDocumentError(`Not a readable 3MF archive: ${message}`)
  }
}

/** Read segmentation attributes from every `3D/*.model` part, keyed by part path. */
export async function readArchiveSegmentation(data: ArchiveInput): Promise<Map<string, SegmentedObject[]>> {
  const zip = await openArchive(data)
  const parts = new Map<string, SegmentedObject[]>()

  for (const path of Object.keys(zip.files).filter(isModelPart).sort()) {
    const file = zip.file(path)
    if (!file) continue
    parts.set(path, readTriangleSegmentation(await file.async('text')))
  }
  return parts
}

export interface ArchiveSegmentationUpdate {
  /** Model part path, e.g. `3D/3dmodel.model`. */
  path: string
  objectId: number
  segmentation: ReadonlyMap<number, string>
  attributeName: SegmentationAttributeName
}

/**
 * Return a copy of the archive with the given objects' segmentation
 * attributes rewritten. Untouched entries keep their original bytes.
 *
 * @throws SegmentationDocumentError for a missing part or object
 */
export async function patchArchiveSegmentation(
  data: ArchiveInput,
  updates: readonly ArchiveSegmentationUpdate[],
): Promise<Uint8Array> {
  const zip = await openArchive(data)
  const patchedParts = new Map<string, string>()

  for (const update of updates) {
    let xml = patchedParts.get(update.path)
    if (xml === undefined) {
      const file = zip.file(update.path)
      if (!file || !isModelPart(update.path)) {
        throw new SegmentationDocumentError(`Model part ${update.path} not found in archive`)
      }
      xml = await file.async('text')
    }
    patchedParts.set(
      update.path,
      writeTriangleSegmentation(xml, update.objectId, update.segmentation, update.attributeName),
    )
  }

  for (const [path, xml] of patchedParts) zip.file(path, xml)

  return zip.generateAsync({
    type: 'uint8array',
    mimeType: 'application/vnd.ms-package.3dmanufacturing-3dmodel+xml',
  })
}
