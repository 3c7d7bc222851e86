/**
 * Matrix operations over the 128-byte packed form.
 *
 * Each operation decodes its operands, runs the Matrix4 implementation and
 * encodes the result. Queries that return a plain value (determinant, get,
 * translation reads, approxEqual) skip the re-encode.
 */

import { Matrix4 } from './Matrix4.ts'
import { packedIdentity, packedZero, toPacked, toStructured } from './MatrixCodec.ts'
import type {
  Axis,
  InvertResult,
  MatrixFormat,
  Offset,
  PackedMat4,
  Rotation,
  Vec2,
  Vec3,
  Vec4,
} from './types.ts'

const encode = toPacked
const decode = toStructured

export class PackedMatrix4 {
  static readonly format: MatrixFormat = 'packed'

  /**
   * Zero matrix (fresh copy of the precomputed bytes)
   */
  static zero(): PackedMat4 {
    return packedZero()
  }

  /**
   * Identity matrix (fresh copy of the precomputed bytes)
   */
  static identity(): PackedMat4 {
    return packedIdentity()
  }

  // ===========================================================================
  // Builders
  // ===========================================================================

  static build2(v0: Vec2, v1: Vec2): PackedMat4 {
    return encode(Matrix4.build2(v0, v1))
  }

  static build3(v0: Vec3, v1: Vec3, v2: Vec3): PackedMat4 {
    return encode(Matrix4.build3(v0, v1, v2))
  }

  static build4(v0: Vec4, v1: Vec4, v2: Vec4, v3: Vec4): PackedMat4 {
    return encode(Matrix4.build4(v0, v1, v2, v3))
  }

  static buildTranslation(x: number, y: number, z = 0): PackedMat4 {
    return encode(Matrix4.buildTranslation(x, y, z))
  }

  static buildTranslationFrom(offset: Offset): PackedMat4 {
    return encode(Matrix4.buildTranslationFrom(offset))
  }

  static buildScale(x: number, y: number, z = 1): PackedMat4 {
    return encode(Matrix4.buildScale(x, y, z))
  }

  static buildUniformScale(s: number): PackedMat4 {
    return encode(Matrix4.buildUniformScale(s))
  }

  static buildScaleFrom(factors: Offset): PackedMat4 {
    return encode(Matrix4.buildScaleFrom(factors))
  }

  static buildRotation(radians: number, axis: Axis = 'z'): PackedMat4 {
    return encode(Matrix4.buildRotation(radians, axis))
  }

  static buildRotationFrom(rotation: Rotation): PackedMat4 {
    return encode(Matrix4.buildRotationFrom(rotation))
  }

  static buildRotateAround(radians: number, point: Offset, axis: Axis = 'z'): PackedMat4 {
    return encode(Matrix4.buildRotateAround(radians, point, axis))
  }

  // ===========================================================================
  // Composition
  // ===========================================================================

  static multiply(a: PackedMat4, b: PackedMat4): PackedMat4 {
    return encode(Matrix4.multiply(decode(a), decode(b)))
  }

  static multiplyAll(matrices: readonly PackedMat4[]): PackedMat4 {
    return encode(Matrix4.multiplyAll(matrices.map(decode)))
  }

  static multiplyScalar(a: PackedMat4, s: number): PackedMat4 {
    return encode(Matrix4.multiplyScalar(decode(a), s))
  }

  static add(a: PackedMat4, b: PackedMat4): PackedMat4 {
    return encode(Matrix4.add(decode(a), decode(b)))
  }

  static subtract(a: PackedMat4, b: PackedMat4): PackedMat4 {
    return encode(Matrix4.subtract(decode(a), decode(b)))
  }

  static divide(a: PackedMat4, s: number): PackedMat4 {
    return encode(Matrix4.divide(decode(a), s))
  }

  /**
   * A missing angle returns m itself, not a re-encoded copy
   */
  static rotate(m: PackedMat4, radians: number | null | undefined, axis: Axis = 'z'): PackedMat4 {
    if (radians == null) return m
    return encode(Matrix4.rotate(decode(m), radians, axis))
  }

  static rotateBy(m: PackedMat4, rotation: Rotation | null | undefined): PackedMat4 {
    if (rotation == null) return m
    return encode(Matrix4.rotateBy(decode(m), rotation))
  }

  static translate(m: PackedMat4, x: number, y: number, z = 0): PackedMat4 {
    return encode(Matrix4.translate(decode(m), x, y, z))
  }

  static translateBy(m: PackedMat4, offset: Offset | null | undefined): PackedMat4 {
    if (offset == null) return m
    return encode(Matrix4.translateBy(decode(m), offset))
  }

  static scale(m: PackedMat4, x: number, y: number, z = 1): PackedMat4 {
    return encode(Matrix4.scale(decode(m), x, y, z))
  }

  static scaleUniform(m: PackedMat4, s: number | null | undefined): PackedMat4 {
    if (s == null) return m
    return encode(Matrix4.scaleUniform(decode(m), s))
  }

  static scaleBy(m: PackedMat4, factors: Offset | null | undefined): PackedMat4 {
    if (factors == null) return m
    return encode(Matrix4.scaleBy(decode(m), factors))
  }

  // ===========================================================================
  // Inversion
  // ===========================================================================

  static determinant(m: PackedMat4): number {
    return Matrix4.determinant(decode(m))
  }

  static adjugate(m: PackedMat4): PackedMat4 {
    return encode(Matrix4.adjugate(decode(m)))
  }

  static invert(m: PackedMat4): InvertResult<PackedMat4> {
    const result = Matrix4.invert(decode(m))
    if (!result.ok) return result
    return { ok: true, matrix: encode(result.matrix) }
  }

  /**
   * @throws SingularMatrixError
   */
  static invertOrThrow(m: PackedMat4): PackedMat4 {
    return encode(Matrix4.invertOrThrow(decode(m)))
  }

  // ===========================================================================
  // Cell access
  // ===========================================================================

  static get(m: PackedMat4, col: number, row: number): number {
    return Matrix4.get(decode(m), col, row)
  }

  static getTranslationXY(m: PackedMat4): Vec2 {
    return Matrix4.getTranslationXY(decode(m))
  }

  static getTranslationXYZ(m: PackedMat4): Vec3 {
    return Matrix4.getTranslationXYZ(decode(m))
  }

  static put(m: PackedMat4, col: number, row: number, value: number): PackedMat4 {
    return encode(Matrix4.put(decode(m), col, row, value))
  }

  static transpose(m: PackedMat4): PackedMat4 {
    return encode(Matrix4.transpose(decode(m)))
  }

  static approxEqual(a: PackedMat4, b: PackedMat4, tolerance?: number): boolean {
    return Matrix4.approxEqual(decode(a), decode(b), tolerance)
  }
}
