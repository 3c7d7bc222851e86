/**
 * Representation selection.
 *
 * The tag is explicit: callers name the form they want back instead of
 * the library sniffing argument shapes.
 */

import { Matrix4 } from './Matrix4.ts'
import { DEFAULT_FORMAT } from './MatrixConfig.ts'
import { PackedMatrix4 } from './PackedMatrix4.ts'
import type { Mat4, MatrixApi, MatrixFormat, PackedMat4 } from './types.ts'

export const structuredMatrix: MatrixApi<Mat4> = Matrix4

export const packedMatrix: MatrixApi<PackedMat4> = PackedMatrix4

/**
 * Get the matrix API for a representation (packed by default)
 */
export function matrixApi(): MatrixApi<PackedMat4>
export function matrixApi(format: 'packed'): MatrixApi<PackedMat4>
export function matrixApi(format: 'structured'): MatrixApi<Mat4>
export function matrixApi(format: MatrixFormat): MatrixApi<PackedMat4> | MatrixApi<Mat4>
export function matrixApi(
  format: MatrixFormat = DEFAULT_FORMAT
): MatrixApi<PackedMat4> | MatrixApi<Mat4> {
  return format === 'structured' ? structuredMatrix : packedMatrix
}
