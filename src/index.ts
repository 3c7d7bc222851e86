/**
 * 4x4 homogeneous transform matrices - Barrel exports
 *
 * Usage:
 * ```typescript
 * import { Matrix, Matrix4 } from 'homogeneous-matrix'
 *
 * // Packed (default): 128 bytes, ready to stream to a uniform buffer
 * const model = Matrix.multiplyAll([
 *   Matrix.buildTranslation(10, 20),
 *   Matrix.buildRotation(Math.PI / 4),
 *   Matrix.buildUniformScale(2),
 * ])
 *
 * // Structured: nested tuples for further manipulation
 * const result = Matrix4.invert(Matrix4.buildScale(2, 4, 8))
 * if (result.ok) console.log(result.matrix)
 * ```
 */

export { Matrix4 } from './math/Matrix4.ts'
export { PackedMatrix4 } from './math/PackedMatrix4.ts'
export { PackedMatrix4 as Matrix } from './math/PackedMatrix4.ts'
export { matrixApi, packedMatrix, structuredMatrix } from './math/matrixApi.ts'
export {
  toPacked,
  toStructured,
  isPackedMatrix,
  toFloat64Array,
  packedZero,
  packedIdentity,
  ZERO,
  IDENTITY,
} from './math/MatrixCodec.ts'
export { MatrixError, SingularMatrixError, MatrixContractError } from './math/MatrixErrors.ts'
export type { MatrixErrorCode } from './math/MatrixErrors.ts'
export {
  DEFAULT_FORMAT,
  DEFAULT_TOLERANCE,
  PACKED_BYTE_LENGTH,
  CELL_BYTES,
  CELL_COUNT,
  LITTLE_ENDIAN,
} from './math/MatrixConfig.ts'
export type {
  Axis,
  InvertResult,
  Mat4,
  MatrixApi,
  MatrixFormat,
  MatrixIndex,
  Offset,
  PackedMat4,
  Rotation,
  Vec2,
  Vec3,
  Vec4,
} from './math/types.ts'
