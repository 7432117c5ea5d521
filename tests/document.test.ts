import JSZip from 'jszip'
import { BufferGeometry, Float32BufferAttribute } from 'three'
import { describe, expect, it, vi } from 'vitest'
import {
  patchArchiveSegmentation,
  readArchiveSegmentation,
  readTriangleSegmentation,
  SegmentationDocumentError,
  segmentationMap,
  SLIC3RPE_NAMESPACE,
  writeTriangleSegmentation,
} from '../src/core/document'
import { silentLogger } from '../src/core/logger'
import { renderMeshSegmentation } from '../src/core/mesh'
import { createPalette } from '../src/core/palette'
import { Raster } from '../src/core/raster'

const MODEL = `<?xml version="1.0" encoding="UTF-8"?>
<model unit="millimeter" xmlns="http://schemas.microsoft.com/3dmanufacturing/core/2015/02">
 <resources>
  <object id="1" name="Cube" type="model">
   <mesh>
    <vertices>
     <vertex x="0" y="0" z="0"/>
     <vertex x="1" y="0" z="0"/>
     <vertex x="1" y="1" z="0"/>
     <vertex x="0" y="1" z="0"/>
    </vertices>
    <triangles>
     <triangle v1="0" v2="1" v3="3" slic3rpe:mmu_segmentation="80123"/>
     <triangle v1="1" v2="2" v3="3"/>
    </triangles>
   </mesh>
  </object>
  <object id="2" type="model">
   <mesh>
    <vertices><vertex x="0" y="0" z="0"/><vertex x="1" y="0" z="0"/><vertex x="0" y="1" z="0"/></vertices>
    <triangles><triangle v1="0" v2="1" v3="2" paint_color="4"/></triangles>
   </mesh>
  </object>
 </resources>
 <build><item objectid="1"/></build>
</model>
`

describe('readTriangleSegmentation', () => {
  it('should list objects with their triangle attributes', () => {
    const objects = readTriangleSegmentation(MODEL)

    expect(objects).toEqual([
      {
        id: 1,
        name: 'Cube',
        vertexCount: 4,
        triangles: [
          { v1: 0, v2: 1, v3: 3, segmentation: '80123', attributeName: 'slic3rpe:mmu_segmentation' },
          { v1: 1, v2: 2, v3: 3 },
        ],
      },
      {
        id: 2,
        vertexCount: 3,
        triangles: [{ v1: 0, v2: 1, v3: 2, segmentation: '4', attributeName: 'paint_color', filament: 1 }],
      },
    ])
    expect(segmentationMap(objects[0])).toEqual(new Map([[0, '80123']]))
  })
})

const FLAT_MODEL = `<model unit="millimeter">
 <resources>
  <object id="5" type="model">
   <mesh>
    <vertices>
     <vertex x="0" y="0" z="0"/><vertex x="1" y="0" z="0"/><vertex x="1" y="1" z="0"/><vertex x="0" y="1" z="0"/>
    </vertices>
    <triangles>
     <triangle v1="0" v2="1" v3="3" paint_color="4"/>
     <triangle v1="1" v2="2" v3="3" paint_color="8"/>
     <triangle v1="0" v2="2" v3="3" paint_color="0c"/>
     <triangle v1="0" v2="1" v3="2" paint_color="1C"/>
     <triangle v1="0" v2="1" v3="2" paint_color="80123"/>
    </triangles>
   </mesh>
  </object>
 </resources>
</model>`

describe('flat paint codes', () => {
  it('should read paint_color codes as filament numbers, not trees', () => {
    const [object] = readTriangleSegmentation(FLAT_MODEL)
    expect(object.triangles.map((t) => t.filament)).toEqual([1, 2, 3, 4, undefined])
    expect(object.triangles[4].segmentation).toBe('80123')
  })

  it('should map filaments to single leaves and report the ones without a leaf', () => {
    const warn = vi.fn()
    const map = segmentationMap(readTriangleSegmentation(FLAT_MODEL)[0], { logger: { debug: () => {}, warn } })

    expect(map).toEqual(
      new Map([
        [0, '1'],
        [1, '2'],
        [2, '3'],
        [4, '80123'],
      ]),
    )
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should paint flat-coded triangles with their filament colour', () => {
    const geometry = new BufferGeometry()
    geometry.setAttribute('position', new Float32BufferAttribute([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0], 3))
    geometry.setAttribute('uv', new Float32BufferAttribute([0, 0, 1, 0, 1, 1, 0, 1], 2))
    geometry.setIndex([0, 1, 3, 1, 2, 3])

    const map = segmentationMap(readTriangleSegmentation(FLAT_MODEL)[0], { logger: silentLogger })
    const raster = Raster.filled(8, 8, [128, 128, 128, 255])
    const result = renderMeshSegmentation(
      geometry,
      map,
      raster,
      createPalette(['#808080', '#FF0000', '#00FF00', '#0000FF']),
      { logger: silentLogger },
    )

    expect(result.decodeFailures).toBe(0)
    expect(raster.getPixel(0, 0)).toEqual([255, 0, 0, 255])
    expect(raster.getPixel(7, 7)).toEqual([0, 255, 0, 255])
  })
})

describe('writeTriangleSegmentation', () => {
  it('should rewrite only the segmentation attributes of one object', () => {
    const result = writeTriangleSegmentation(MODEL, 1, new Map([[1, '3']]), 'slic3rpe:mmu_segmentation')

    const expected = MODEL.replace(' slic3rpe:mmu_segmentation="80123"/>', '/>')
      .replace('<triangle v1="1" v2="2" v3="3"/>', '<triangle v1="1" v2="2" v3="3" slic3rpe:mmu_segmentation="3"/>')
      .replace('<model ', `<model xmlns:slic3rpe="${SLIC3RPE_NAMESPACE}" `)
    expect(result).toBe(expected)
  })

  it('should keep the chosen attribute name and skip the namespace when it is not needed', () => {
    const result = writeTriangleSegmentation(MODEL, 2, new Map([[0, '80123']]), 'paint_color')
    expect(result).toBe(MODEL.replace('paint_color="4"', 'paint_color="80123"'))
  })

  it('should write under the name it is given, without a namespace for a plain name', () => {
    const result = writeTriangleSegmentation(MODEL, 1, new Map([[1, '3']]), 'mmu_segmentation')

    expect(result).toBe(
      MODEL.replace(' slic3rpe:mmu_segmentation="80123"/>', '/>').replace(
        '<triangle v1="1" v2="2" v3="3"/>',
        '<triangle v1="1" v2="2" v3="3" mmu_segmentation="3"/>',
      ),
    )
  })

  it('should clear attributes for triangles without an entry', () => {
    const result = writeTriangleSegmentation(MODEL, 1, new Map(), 'mmu_segmentation')
    expect(result).toBe(MODEL.replace(' slic3rpe:mmu_segmentation="80123"/>', '/>'))
    expect(readTriangleSegmentation(result)[0].triangles.every((t) => t.segmentation === undefined)).toBe(true)
  })

  it('should fail for an unknown object', () => {
    expect(() => writeTriangleSegmentation(MODEL, 3, new Map(), 'mmu_segmentation')).toThrow(SegmentationDocumentError)
  })
})

describe('archive segmentation', () => {
  async function buildArchive(): Promise<Uint8Array> {
    const zip = new JSZip()
    zip.file('[Content_Types].xml', '<Types/>')
    zip.file('3D/3dmodel.model', MODEL)
    zip.file('Metadata/notes.txt', 'keep me')
    return zip.generateAsync({ type: 'uint8array' })
  }

  it('should read every model part', async () => {
    const parts = await readArchiveSegmentation(await buildArchive())
    expect([...parts.keys()]).toEqual(['3D/3dmodel.model'])
    expect(parts.get('3D/3dmodel.model')?.map((object) => object.id)).toEqual([1, 2])
  })

  it('should patch a model part and keep every other entry', async () => {
    const segmentation = new Map([[1, '3']])
    const patched = await patchArchiveSegmentation(await buildArchive(), [
      { path: '3D/3dmodel.model', objectId: 1, segmentation, attributeName: 'slic3rpe:mmu_segmentation' },
      { path: '3D/3dmodel.model', objectId: 2, segmentation: new Map(), attributeName: 'paint_color' },
    ])

    const zip = await JSZip.loadAsync(patched)
    const model = await zip.file('3D/3dmodel.model')?.async('text')
    expect(model).toBe(
      writeTriangleSegmentation(
        writeTriangleSegmentation(MODEL, 1, segmentation, 'slic3rpe:mmu_segmentation'),
        2,
        new Map(),
        'paint_color',
      ),
    )
    expect(await zip.file('Metadata/notes.txt')?.async('text')).toBe('keep me')
  })

  it('should reject missing parts and unreadable archives', async () => {
    const archive = await buildArchive()
    await expect(
      patchArchiveSegmentation(archive, [
        { path: '3D/missing.model', objectId: 1, segmentation: new Map(), attributeName: 'mmu_segmentation' },
      ]),
    ).rejects.toBeInstanceOf(SegmentationDocumentError)
    await expect(readArchiveSegmentation(new Uint8Array([1, 2, 3, 4]))).rejects.toBeInstanceOf(
      SegmentationDocumentError,
    )
  })
})
