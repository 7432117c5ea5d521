import { Vector2, Vector3 } from 'three'
import { describe, expect, it } from 'vitest'
import { leaf, split } from '../src/core/codec'
import {
  collectLeafFootprints,
  footprintArea,
  InvalidFootprintError,
  isDegenerate,
  subdivideFootprint,
} from '../src/core/subdivider'
import type { UVFootprint } from '../src/core/types'
import { seededRandom, type Random } from './helpers'

const uv = (x: number, y: number) => new Vector2(x, y)

function strictlyInside([a, b, c]: UVFootprint, p: Vector2): boolean {
  const cross = (o: Vector2, s: Vector2, t: Vector2) => (s.x - o.x) * (t.y - o.y) - (t.x - o.x) * (s.y - o.y)
  const d0 = cross(a, b, p)
  const d1 = cross(b, c, p)
  const d2 = cross(c, a, p)
  return (d0 > 0 && d1 > 0 && d2 > 0) || (d0 < 0 && d1 < 0 && d2 < 0)
}

describe('subdivideFootprint', () => {
  const root: UVFootprint = [uv(0, 0), uv(4, 0), uv(0, 4)]

  it('should return the children in corner0, corner1, corner2, center order', () => {
    const [c0, c1, c2, c3] = subdivideFootprint(root)
    const flat = (fp: UVFootprint) => fp.map((p) => [p.x, p.y])

    expect(flat(c0)).toEqual([[0, 0], [2, 0], [0, 2]])
    expect(flat(c1)).toEqual([[4, 0], [2, 2], [2, 0]])
    expect(flat(c2)).toEqual([[0, 4], [0, 2], [2, 2]])
    expect(flat(c3)).toEqual([[2, 0], [2, 2], [0, 2]])
  })

  it('should not modify the input corners', () => {
    subdivideFootprint(root)
    expect(root.map((p) => [p.x, p.y])).toEqual([[0, 0], [4, 0], [0, 4]])
  })

  it('should partition the parent', () => {
    const children = subdivideFootprint(root)
    const total = children.reduce((sum, child) => sum + footprintArea(child), 0)
    expect(footprintArea(root)).toBeCloseTo(8, 9)
    expect(total).toBeCloseTo(footprintArea(root), 9)

    // Off-grid sample points so none lands on a shared edge.
    for (let y = 0.13; y < 4; y += 0.25) {
      for (let x = 0.07; x < 4; x += 0.25) {
        const p = uv(x, y)
        const hits = children.filter((child) => strictlyInside(child, p)).length
        expect(hits).toBe(strictlyInside(root, p) ? 1 : 0)
      }
    }
  })

  it('should work in object space', () => {
    const [, , , center] = subdivideFootprint([new Vector3(0, 0, 0), new Vector3(2, 0, 0), new Vector3(0, 0, 2)])
    expect(center.map((p) => p.toArray())).toEqual([
      [1, 0, 0],
      [1, 0, 1],
      [0, 0, 1],
    ])
  })

  it('should reject degenerate footprints', () => {
    const collinear: UVFootprint = [uv(0, 0), uv(1, 1), uv(2, 2)]
    const repeated: UVFootprint = [uv(1, 1), uv(1, 1), uv(1, 1)]
    const nonFinite: UVFootprint = [uv(0, 0), uv(Number.NaN, 0), uv(0, 1)]

    for (const fp of [collinear, repeated, nonFinite]) {
      expect(isDegenerate(fp)).toBe(true)
      expect(() => subdivideFootprint(fp)).toThrow(InvalidFootprintError)
    }
    expect(isDegenerate(root)).toBe(false)
  })
})

function randomTriangle(random: Random): UVFootprint {
  const point = () => uv(random() * 20 - 10, random() * 20 - 10)
  for (;;) {
    const fp: UVFootprint = [point(), point(), point()]
    if (footprintArea(fp) > 0.5) return fp
  }
}

/** Nearly collinear: the third corner sits just off the first edge. */
function thinTriangle(random: Random): UVFootprint {
  const a = uv(random() * 20 - 10, random() * 20 - 10)
  const b = uv(random() * 20 - 10, random() * 20 - 10)
  const normal = uv(a.y - b.y, b.x - a.x).normalize()
  const c = a.clone().lerp(b, random()).addScaledVector(normal, 1e-3)
  return [a, b, c]
}

/** Barycentric weights kept clear of the corners and of the midpoint lines. */
function randomWeights(random: Random): [number, number, number] {
  for (;;) {
    const w0 = random()
    const w1 = random()
    const w2 = 1 - w0 - w1
    const weights: [number, number, number] = [w0, w1, w2]
    if (weights.every((w) => w > 0.01 && Math.abs(w - 0.5) > 0.01)) return weights
  }
}

describe('subdivideFootprint on random triangles', () => {
  const random = seededRandom(7)
  const obtuse: UVFootprint = [uv(0, 0), uv(10, 0), uv(9, 0.5)]
  const triangles: UVFootprint[] = [
    ...Array.from({ length: 40 }, () => randomTriangle(random)),
    ...Array.from({ length: 20 }, () => thinTriangle(random)),
    obtuse,
  ]

  it('should give four children of a quarter of the area each', () => {
    for (const fp of triangles) {
      const area = footprintArea(fp)
      for (const child of subdivideFootprint(fp)) {
        expect(Math.abs(footprintArea(child) / area - 0.25)).toBeLessThan(1e-6)
      }
    }
  })

  it('should place every interior point in exactly one child, the one its weights select', () => {
    for (const fp of triangles) {
      const children = subdivideFootprint(fp)
      for (let i = 0; i < 25; i++) {
        const [w0, w1, w2] = randomWeights(random)
        const p = uv(0, 0)
          .addScaledVector(fp[0], w0)
          .addScaledVector(fp[1], w1)
          .addScaledVector(fp[2], w2)
        const expected = w0 > 0.5 ? 0 : w1 > 0.5 ? 1 : w2 > 0.5 ? 2 : 3

        const hits = children.flatMap((child, index) => (strictlyInside(child, p) ? [index] : []))
        expect(hits).toEqual([expected])
      }
    }
  })
})

describe('collectLeafFootprints', () => {
  it('should list leaves in pre-order with their depth', () => {
    const tree = split(leaf(1), split(leaf(2), leaf(0), leaf(0), leaf(3)), leaf(0), leaf(2))
    const leaves = collectLeafFootprints(tree, [uv(0, 0), uv(1, 0), uv(0, 1)])

    expect(leaves.map((l) => [l.materialIndex, l.depth])).toEqual([
      [1, 1],
      [2, 2],
      [0, 2],
      [0, 2],
      [3, 2],
      [0, 1],
      [2, 1],
    ])
    // First grandchild is corner0 of corner1: [v1, m12, m01] shrunk towards v1.
    expect(leaves[1].footprint.map((p) => [p.x, p.y])).toEqual([[1, 0], [0.75, 0.25], [0.75, 0]])
  })

  it('should not subdivide a lone leaf', () => {
    const degenerate: UVFootprint = [uv(0, 0), uv(0, 0), uv(0, 0)]
    expect(collectLeafFootprints(leaf(2), degenerate)).toHaveLength(1)
  })
})
