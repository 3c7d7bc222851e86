/**
 * Property-based tests for the matrix algebra laws.
 *
 * Random cells stay within [-10, 10] where a law is checked against a
 * tolerance, so accumulated rounding stays far below 1e-6.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { Matrix4 } from './Matrix4.ts'
import { PackedMatrix4 } from './PackedMatrix4.ts'
import { toPacked, toStructured } from './MatrixCodec.ts'
import type { Mat4 } from './types.ts'

// =============================================================================
// Arbitraries
// =============================================================================

const cellArb = fc.double({ min: -10, max: 10, noNaN: true })

const rowArb = fc.tuple(cellArb, cellArb, cellArb, cellArb)

const matrixArb = fc.tuple(rowArb, rowArb, rowArb, rowArb)

// Any double but NaN, infinities included
const anyCellArb = fc.double({ noNaN: true })
const anyRowArb = fc.tuple(anyCellArb, anyCellArb, anyCellArb, anyCellArb)
const anyMatrixArb = fc.tuple(anyRowArb, anyRowArb, anyRowArb, anyRowArb)

// Rigid transform with a bounded scale: always invertible, well conditioned
const transformArb = fc
  .record({
    tx: fc.double({ min: -100, max: 100, noNaN: true }),
    ty: fc.double({ min: -100, max: 100, noNaN: true }),
    tz: fc.double({ min: -100, max: 100, noNaN: true }),
    radians: fc.double({ min: -Math.PI, max: Math.PI, noNaN: true }),
    axis: fc.constantFrom('x' as const, 'y' as const, 'z' as const),
    scale: fc.double({ min: 0.5, max: 2, noNaN: true }),
  })
  .map(({ tx, ty, tz, radians, axis, scale }) =>
    Matrix4.multiplyAll([
      Matrix4.buildTranslation(tx, ty, tz),
      Matrix4.buildRotation(radians, axis),
      Matrix4.buildUniformScale(scale),
    ])
  )

// 8 on the diagonal outweighs three off-diagonal cells of at most 1
const noiseArb = fc.double({ min: -1, max: 1, noNaN: true })
const noiseRowArb = fc.tuple(noiseArb, noiseArb, noiseArb, noiseArb)
const dominantArb = fc
  .tuple(noiseRowArb, noiseRowArb, noiseRowArb, noiseRowArb)
  .map((noise) => Matrix4.add(Matrix4.multiplyScalar(Matrix4.IDENTITY, 8), noise))

const smallIntArb = fc.integer({ min: -5, max: 5 })
const intRowArb = fc.tuple(smallIntArb, smallIntArb, smallIntArb, smallIntArb)

const indexArb = fc.integer({ min: 0, max: 3 })

// Fold -0 into 0 so value comparisons ignore the sign of zero
function values(m: Mat4): number[] {
  return m.flat().map((v) => v + 0)
}

// =============================================================================
// Representation
// =============================================================================

describe('Matrix representation properties', () => {
  it('round-trips through the packed form bit for bit', () => {
    fc.assert(
      fc.property(anyMatrixArb, (m) => {
        expect(toStructured(toPacked(m))).toEqual(m)
      })
    )
  })

  it('gives the same product through the packed facade', () => {
    fc.assert(
      fc.property(matrixArb, matrixArb, (a, b) => {
        const packed = PackedMatrix4.multiply(toPacked(a), toPacked(b))
        expect(toStructured(packed)).toEqual(Matrix4.multiply(a, b))
      })
    )
  })
})

// =============================================================================
// Algebra
// =============================================================================

describe('Matrix algebra properties', () => {
  it('leaves a matrix unchanged when multiplied by the identity', () => {
    fc.assert(
      fc.property(matrixArb, (m) => {
        expect(values(Matrix4.multiply(m, Matrix4.IDENTITY))).toEqual(values(m))
        expect(values(Matrix4.multiply(Matrix4.IDENTITY, m))).toEqual(values(m))
      })
    )
  })

  it('multiplies associatively within tolerance', () => {
    fc.assert(
      fc.property(matrixArb, matrixArb, matrixArb, (a, b, c) => {
        const left = Matrix4.multiply(Matrix4.multiply(a, b), c)
        const right = Matrix4.multiply(a, Matrix4.multiply(b, c))
        return Matrix4.approxEqual(left, right, 1e-6)
      })
    )
  })

  it('folds a list the same way as chained multiplies', () => {
    fc.assert(
      fc.property(matrixArb, matrixArb, matrixArb, (a, b, c) => {
        const chained = Matrix4.multiply(Matrix4.multiply(a, b), c)
        expect(values(Matrix4.multiplyAll([a, b, c]))).toEqual(values(chained))
      })
    )
  })

  it('undoes a transpose with a transpose', () => {
    fc.assert(
      fc.property(anyMatrixArb, (m) => {
        expect(Matrix4.transpose(Matrix4.transpose(m))).toEqual(m)
      })
    )
  })

  it('changes only the cell that put targets', () => {
    fc.assert(
      fc.property(matrixArb, indexArb, indexArb, cellArb, (m, col, row, value) => {
        const updated = Matrix4.put(m, col, row, value)
        expect(Matrix4.get(updated, col, row)).toBe(value)
        for (let r = 0; r < 4; r++) {
          for (let c = 0; c < 4; c++) {
            if (r === row && c === col) continue
            expect(Matrix4.get(updated, c, r)).toBe(Matrix4.get(m, c, r))
          }
        }
      })
    )
  })
})

// =============================================================================
// Inversion
// =============================================================================

describe('Matrix inversion properties', () => {
  it('inverts rigid transforms', () => {
    fc.assert(
      fc.property(transformArb, (m) => {
        const inverse = Matrix4.invertOrThrow(m)
        return Matrix4.approxEqual(Matrix4.multiply(inverse, m), Matrix4.IDENTITY, 1e-6)
      })
    )
  })

  it('inverts diagonally dominant matrices', () => {
    fc.assert(
      fc.property(dominantArb, (m) => {
        const result = Matrix4.invert(m)
        if (!result.ok) return false
        return Matrix4.approxEqual(Matrix4.multiply(result.matrix, m), Matrix4.IDENTITY, 1e-6)
      })
    )
  })

  it('reports matrices with a repeated row as singular', () => {
    fc.assert(
      fc.property(intRowArb, intRowArb, intRowArb, (repeated, r2, r3) => {
        const m = Matrix4.build4(repeated, repeated, r2, r3)
        const result = Matrix4.invert(m)
        expect(result.ok).toBe(false)
      })
    )
  })
})
