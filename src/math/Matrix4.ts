/**
 * 4x4 homogeneous transform matrices over the structured form.
 *
 * Values are nested readonly tuples, m[row][col], translation in column 3.
 * Every operation is pure and returns a new matrix; the Zero and Identity
 * constants are frozen and shared.
 *
 * PackedMatrix4 exposes the same operations over the 128-byte packed form.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import { DEFAULT_TOLERANCE } from './MatrixConfig.ts'
import { IDENTITY, ZERO } from './MatrixCodec.ts'
import { MatrixContractError, SingularMatrixError } from './MatrixErrors.ts'
import type {
  Axis,
  InvertResult,
  Mat4,
  MatrixFormat,
  MatrixIndex,
  Offset,
  Rotation,
  Vec2,
  Vec3,
  Vec4,
} from './types.ts'

const INDICES = [0, 1, 2, 3] as const

type CellFn = (value: number, row: MatrixIndex, col: MatrixIndex) => number

function mapRow(v: Vec4, row: MatrixIndex, fn: CellFn): Vec4 {
  return [fn(v[0], row, 0), fn(v[1], row, 1), fn(v[2], row, 2), fn(v[3], row, 3)]
}

function mapCells(m: Mat4, fn: CellFn): Mat4 {
  return [mapRow(m[0], 0, fn), mapRow(m[1], 1, fn), mapRow(m[2], 2, fn), mapRow(m[3], 3, fn)]
}

function zipCells(a: Mat4, b: Mat4, fn: (x: number, y: number) => number): Mat4 {
  return mapCells(a, (value, row, col) => fn(value, b[row][col]))
}

function isMatrixIndex(n: number): n is MatrixIndex {
  return n === 0 || n === 1 || n === 2 || n === 3
}

function assertIndex(n: number, name: string): asserts n is MatrixIndex {
  if (!isMatrixIndex(n)) {
    throw new MatrixContractError(`${name} must be an integer from 0 to 3, got ${n}`)
  }
}

export class Matrix4 {
  static readonly format: MatrixFormat = 'structured'

  static readonly ZERO = ZERO

  static readonly IDENTITY = IDENTITY

  /**
   * Zero matrix (shared frozen constant)
   */
  static zero(): Mat4 {
    return ZERO
  }

  /**
   * Identity matrix (shared frozen constant)
   */
  static identity(): Mat4 {
    return IDENTITY
  }

  // ===========================================================================
  // Builders
  // ===========================================================================

  /**
   * Build from two 2-component vectors; the rest comes from the identity
   */
  static build2(v0: Vec2, v1: Vec2): Mat4 {
    return [
      [v0[0], v0[1], 0, 0],
      [v1[0], v1[1], 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 1],
    ]
  }

  /**
   * Build from three 3-component vectors; the rest comes from the identity
   */
  static build3(v0: Vec3, v1: Vec3, v2: Vec3): Mat4 {
    return [
      [v0[0], v0[1], v0[2], 0],
      [v1[0], v1[1], v1[2], 0],
      [v2[0], v2[1], v2[2], 0],
      [0, 0, 0, 1],
    ]
  }

  /**
   * Build from four 4-component vectors, used as-is
   */
  static build4(v0: Vec4, v1: Vec4, v2: Vec4, v3: Vec4): Mat4 {
    return [
      [v0[0], v0[1], v0[2], v0[3]],
      [v1[0], v1[1], v1[2], v1[3]],
      [v2[0], v2[1], v2[2], v2[3]],
      [v3[0], v3[1], v3[2], v3[3]],
    ]
  }

  /**
   * Identity with column 3 set to (x, y, z, 1)
   */
  static buildTranslation(x: number, y: number, z = 0): Mat4 {
    return [
      [1, 0, 0, x],
      [0, 1, 0, y],
      [0, 0, 1, z],
      [0, 0, 0, 1],
    ]
  }

  static buildTranslationFrom(offset: Offset): Mat4 {
    const [x, y, z = 0] = offset
    return Matrix4.buildTranslation(x, y, z)
  }

  /**
   * Diagonal matrix (x, y, z, 1)
   */
  static buildScale(x: number, y: number, z = 1): Mat4 {
    return [
      [x, 0, 0, 0],
      [0, y, 0, 0],
      [0, 0, z, 0],
      [0, 0, 0, 1],
    ]
  }

  static buildUniformScale(s: number): Mat4 {
    return Matrix4.buildScale(s, s, s)
  }

  static buildScaleFrom(factors: Offset): Mat4 {
    const [x, y, z = 1] = factors
    return Matrix4.buildScale(x, y, z)
  }

  /**
   * Rotation about one axis.
   *
   * X and Z put +sin above the diagonal, Y puts it below.
   */
  static buildRotation(radians: number, axis: Axis = 'z'): Mat4 {
    const c = Math.cos(radians)
    const s = Math.sin(radians)

    switch (axis) {
      case 'x':
        return [
          [1, 0, 0, 0],
          [0, c, s, 0],
          [0, -s, c, 0],
          [0, 0, 0, 1],
        ]
      case 'y':
        return [
          [c, 0, s, 0],
          [0, 1, 0, 0],
          [-s, 0, c, 0],
          [0, 0, 0, 1],
        ]
      case 'z':
        return [
          [c, s, 0, 0],
          [-s, c, 0, 0],
          [0, 0, 1, 0],
          [0, 0, 0, 1],
        ]
      default:
        throw new MatrixContractError(`Unknown rotation axis: ${String(axis)}`)
    }
  }

  static buildRotationFrom(rotation: Rotation): Mat4 {
    return Matrix4.buildRotation(rotation.radians, rotation.axis)
  }

  /**
   * Rotation about an axis through `point`:
   * translate(-point) * rotation * translate(point)
   */
  static buildRotateAround(radians: number, point: Offset, axis: Axis = 'z'): Mat4 {
    const [x, y, z = 0] = point
    return Matrix4.multiplyAll([
      Matrix4.buildTranslation(-x, -y, -z),
      Matrix4.buildRotation(radians, axis),
      Matrix4.buildTranslation(x, y, z),
    ])
  }

  // ===========================================================================
  // Composition
  // ===========================================================================

  /**
   * Matrix product a * b
   */
  static multiply(a: Mat4, b: Mat4): Mat4 {
    return mapCells(ZERO, (_, i, j) =>
      a[i][0] * b[0][j] + a[i][1] * b[1][j] + a[i][2] * b[2][j] + a[i][3] * b[3][j]
    )
  }

  /**
   * Left fold of multiply starting from the identity
   */
  static multiplyAll(matrices: readonly Mat4[]): Mat4 {
    return matrices.reduce<Mat4>((acc, m) => Matrix4.multiply(acc, m), IDENTITY)
  }

  static multiplyScalar(a: Mat4, s: number): Mat4 {
    return mapCells(a, (value) => value * s)
  }

  static add(a: Mat4, b: Mat4): Mat4 {
    return zipCells(a, b, (x, y) => x + y)
  }

  static subtract(a: Mat4, b: Mat4): Mat4 {
    return zipCells(a, b, (x, y) => x - y)
  }

  /**
   * Divide every cell by s. Division by zero follows IEEE-754.
   */
  static divide(a: Mat4, s: number): Mat4 {
    return mapCells(a, (value) => value / s)
  }

  /**
   * m * rotation; a missing angle leaves m unchanged
   */
  static rotate(m: Mat4, radians: number | null | undefined, axis: Axis = 'z'): Mat4 {
    if (radians == null) return m
    return Matrix4.multiply(m, Matrix4.buildRotation(radians, axis))
  }

  static rotateBy(m: Mat4, rotation: Rotation | null | undefined): Mat4 {
    if (rotation == null) return m
    return Matrix4.rotate(m, rotation.radians, rotation.axis)
  }

  /**
   * m * translation
   */
  static translate(m: Mat4, x: number, y: number, z = 0): Mat4 {
    return Matrix4.multiply(m, Matrix4.buildTranslation(x, y, z))
  }

  static translateBy(m: Mat4, offset: Offset | null | undefined): Mat4 {
    if (offset == null) return m
    return Matrix4.multiply(m, Matrix4.buildTranslationFrom(offset))
  }

  /**
   * m * scale
   */
  static scale(m: Mat4, x: number, y: number, z = 1): Mat4 {
    return Matrix4.multiply(m, Matrix4.buildScale(x, y, z))
  }

  static scaleUniform(m: Mat4, s: number | null | undefined): Mat4 {
    if (s == null) return m
    return Matrix4.multiply(m, Matrix4.buildUniformScale(s))
  }

  static scaleBy(m: Mat4, factors: Offset | null | undefined): Mat4 {
    if (factors == null) return m
    return Matrix4.multiply(m, Matrix4.buildScaleFrom(factors))
  }

  // ===========================================================================
  // Inversion
  // ===========================================================================

  /**
   * Full 24-term expansion. invert() compares the result against exactly 0,
   * so the term order is fixed.
   */
  static determinant(matrix: Mat4): number {
    const [[m0, m1, m2, m3], [m4, m5, m6, m7], [m8, m9, m10, m11], [m12, m13, m14, m15]] = matrix

    return (
      m0 * m5 * m10 * m15 + m0 * m9 * m14 * m7 + m0 * m13 * m6 * m11 +
      m4 * m1 * m14 * m11 + m4 * m9 * m2 * m15 + m4 * m13 * m10 * m3 +
      m8 * m1 * m6 * m15 + m8 * m5 * m14 * m3 + m8 * m13 * m2 * m7 +
      m12 * m1 * m10 * m7 + m12 * m5 * m2 * m11 + m12 * m9 * m6 * m3 -
      m0 * m5 * m14 * m11 - m0 * m9 * m6 * m15 - m0 * m13 * m10 * m7 -
      m4 * m1 * m10 * m15 - m4 * m9 * m14 * m3 - m4 * m13 * m2 * m11 -
      m8 * m1 * m14 * m7 - m8 * m5 * m2 * m15 - m8 * m13 * m6 * m3 -
      m12 * m1 * m6 * m11 - m12 * m5 * m10 * m3 - m12 * m9 * m2 * m7
    )
  }

  /**
   * Transpose of the cofactor matrix
   */
  static adjugate(matrix: Mat4): Mat4 {
    const [[m0, m1, m2, m3], [m4, m5, m6, m7], [m8, m9, m10, m11], [m12, m13, m14, m15]] = matrix

    const inv0 =
      m5 * m10 * m15 - m5 * m11 * m14 - m9 * m6 * m15 +
      m9 * m7 * m14 + m13 * m6 * m11 - m13 * m7 * m10
    const inv4 =
      -m4 * m10 * m15 + m4 * m11 * m14 + m8 * m6 * m15 -
      m8 * m7 * m14 - m12 * m6 * m11 + m12 * m7 * m10
    const inv8 =
      m4 * m9 * m15 - m4 * m11 * m13 - m8 * m5 * m15 +
      m8 * m7 * m13 + m12 * m5 * m11 - m12 * m7 * m9
    const inv12 =
      -m4 * m9 * m14 + m4 * m10 * m13 + m8 * m5 * m14 -
      m8 * m6 * m13 - m12 * m5 * m10 + m12 * m6 * m9
    const inv1 =
      -m1 * m10 * m15 + m1 * m11 * m14 + m9 * m2 * m15 -
      m9 * m3 * m14 - m13 * m2 * m11 + m13 * m3 * m10
    const inv5 =
      m0 * m10 * m15 - m0 * m11 * m14 - m8 * m2 * m15 +
      m8 * m3 * m14 + m12 * m2 * m11 - m12 * m3 * m10
    const inv9 =
      -m0 * m9 * m15 + m0 * m11 * m13 + m8 * m1 * m15 -
      m8 * m3 * m13 - m12 * m1 * m11 + m12 * m3 * m9
    const inv13 =
      m0 * m9 * m14 - m0 * m10 * m13 - m8 * m1 * m14 +
      m8 * m2 * m13 + m12 * m1 * m10 - m12 * m2 * m9
    const inv2 =
      m1 * m6 * m15 - m1 * m7 * m14 - m5 * m2 * m15 +
      m5 * m3 * m14 + m13 * m2 * m7 - m13 * m3 * m6
    const inv6 =
      -m0 * m6 * m15 + m0 * m7 * m14 + m4 * m2 * m15 -
      m4 * m3 * m14 - m12 * m2 * m7 + m12 * m3 * m6
    const inv10 =
      m0 * m5 * m15 - m0 * m7 * m13 - m4 * m1 * m15 +
      m4 * m3 * m13 + m12 * m1 * m7 - m12 * m3 * m5
    const inv14 =
      -m0 * m5 * m14 + m0 * m6 * m13 + m4 * m1 * m14 -
      m4 * m2 * m13 - m12 * m1 * m6 + m12 * m2 * m5
    const inv3 =
      -m1 * m6 * m11 + m1 * m7 * m10 + m5 * m2 * m11 -
      m5 * m3 * m10 - m9 * m2 * m7 + m9 * m3 * m6
    const inv7 =
      m0 * m6 * m11 - m0 * m7 * m10 - m4 * m2 * m11 +
      m4 * m3 * m10 + m8 * m2 * m7 - m8 * m3 * m6
    const inv11 =
      -m0 * m5 * m11 + m0 * m7 * m9 + m4 * m1 * m11 -
      m4 * m3 * m9 - m8 * m1 * m7 + m8 * m3 * m5
    const inv15 =
      m0 * m5 * m10 - m0 * m6 * m9 - m4 * m1 * m10 +
      m4 * m2 * m9 + m8 * m1 * m6 - m8 * m2 * m5

    return [
      [inv0, inv1, inv2, inv3],
      [inv4, inv5, inv6, inv7],
      [inv8, inv9, inv10, inv11],
      [inv12, inv13, inv14, inv15],
    ]
  }

  /**
   * adjugate(m) / determinant(m), or a SingularMatrixError when the
   * determinant is exactly 0
   */
  static invert(m: Mat4): InvertResult<Mat4> {
    const det = Matrix4.determinant(m)
    if (det === 0) {
      SafeConsole.debug('Matrix4: cannot invert, determinant is 0')
      return { ok: false, error: new SingularMatrixError(det) }
    }
    return { ok: true, matrix: Matrix4.multiplyScalar(Matrix4.adjugate(m), 1.0 / det) }
  }

  /**
   * @throws SingularMatrixError
   */
  static invertOrThrow(m: Mat4): Mat4 {
    const result = Matrix4.invert(m)
    if (!result.ok) {
      throw result.error
    }
    return result.matrix
  }

  // ===========================================================================
  // Cell access
  // ===========================================================================

  /**
   * Cell at column `col`, row `row`
   * @throws MatrixContractError if either index is outside 0-3
   */
  static get(m: Mat4, col: number, row: number): number {
    assertIndex(col, 'col')
    assertIndex(row, 'row')
    return m[row][col]
  }

  static getTranslationXY(m: Mat4): Vec2 {
    return [m[0][3], m[1][3]]
  }

  static getTranslationXYZ(m: Mat4): Vec3 {
    return [m[0][3], m[1][3], m[2][3]]
  }

  /**
   * Copy of m with one cell replaced
   * @throws MatrixContractError if either index is outside 0-3
   */
  static put(m: Mat4, col: number, row: number, value: number): Mat4 {
    assertIndex(col, 'col')
    assertIndex(row, 'row')
    return mapCells(m, (current, r, c) => (r === row && c === col ? value : current))
  }

  static transpose(m: Mat4): Mat4 {
    return mapCells(m, (_, row, col) => m[col][row])
  }

  /**
   * True when every cell pair differs by strictly less than `tolerance`.
   * Exact equality rarely survives a chain of products.
   */
  static approxEqual(a: Mat4, b: Mat4, tolerance = DEFAULT_TOLERANCE): boolean {
    for (const row of INDICES) {
      for (const col of INDICES) {
        if (!(Math.abs(a[row][col] - b[row][col]) < tolerance)) {
          return false
        }
      }
    }
    return true
  }
}
