/**
 * Matrix value types and the API contract shared by both representations.
 */

import type { SingularMatrixError } from './MatrixErrors.ts'

export type Vec2 = readonly [number, number]
export type Vec3 = readonly [number, number, number]
export type Vec4 = readonly [number, number, number, number]

/**
 * Structured 4x4 matrix. get(m, col, row) reads m[row][col], so the
 * translation sits in column 3: m[0][3], m[1][3], m[2][3].
 */
export type Mat4 = readonly [Vec4, Vec4, Vec4, Vec4]

/**
 * Packed 4x4 matrix: exactly 128 bytes, see MatrixConfig for the layout
 */
export type PackedMat4 = Uint8Array

export type MatrixFormat = 'packed' | 'structured'

export type Axis = 'x' | 'y' | 'z'

export type MatrixIndex = 0 | 1 | 2 | 3

/** Translation offset or scale factors; z falls back to the identity value */
export type Offset = readonly [x: number, y: number, z?: number]

export interface Rotation {
  readonly radians: number
  readonly axis?: Axis
}

export type InvertResult<M> =
  | { readonly ok: true; readonly matrix: M }
  | { readonly ok: false; readonly error: SingularMatrixError }

/**
 * Every matrix operation, over one representation M.
 *
 * Matrix4 implements it for Mat4 and PackedMatrix4 for PackedMat4, so code
 * written against MatrixApi<M> runs unchanged on either form.
 */
export interface MatrixApi<M> {
  readonly format: MatrixFormat

  zero(): M
  identity(): M

  build2(v0: Vec2, v1: Vec2): M
  build3(v0: Vec3, v1: Vec3, v2: Vec3): M
  build4(v0: Vec4, v1: Vec4, v2: Vec4, v3: Vec4): M
  buildTranslation(x: number, y: number, z?: number): M
  buildTranslationFrom(offset: Offset): M
  buildScale(x: number, y: number, z?: number): M
  buildUniformScale(s: number): M
  buildScaleFrom(factors: Offset): M
  buildRotation(radians: number, axis?: Axis): M
  buildRotationFrom(rotation: Rotation): M
  buildRotateAround(radians: number, point: Offset, axis?: Axis): M

  multiply(a: M, b: M): M
  multiplyAll(matrices: readonly M[]): M
  multiplyScalar(a: M, s: number): M
  add(a: M, b: M): M
  subtract(a: M, b: M): M
  divide(a: M, s: number): M

  rotate(m: M, radians: number | null | undefined, axis?: Axis): M
  rotateBy(m: M, rotation: Rotation | null | undefined): M
  translate(m: M, x: number, y: number, z?: number): M
  translateBy(m: M, offset: Offset | null | undefined): M
  scale(m: M, x: number, y: number, z?: number): M
  scaleUniform(m: M, s: number | null | undefined): M
  scaleBy(m: M, factors: Offset | null | undefined): M

  determinant(m: M): number
  adjugate(m: M): M
  invert(m: M): InvertResult<M>
  invertOrThrow(m: M): M

  get(m: M, col: number, row: number): number
  getTranslationXY(m: M): Vec2
  getTranslationXYZ(m: M): Vec3
  put(m: M, col: number, row: number, value: number): M
  transpose(m: M): M
  approxEqual(a: M, b: M, tolerance?: number): boolean
}
