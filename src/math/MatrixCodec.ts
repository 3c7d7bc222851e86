/**
 * MatrixCodec - Packed binary encoding for 4x4 matrices
 *
 * Packed format (128 bytes):
 * Bytes 0-7:     m[0][0] (float64 LE)
 * Bytes 8-15:    m[0][1]
 * ...
 * Bytes 120-127: m[3][3]
 *
 * Cells are written in the nesting order of the structured form, so the
 * buffer can be streamed to a uniform buffer as-is. Encoding is lossless
 * for finite values and keeps signed zeros and infinities.
 */

import { SafeConsole } from '../core/SafeConsole.ts'
import { CELL_BYTES, LITTLE_ENDIAN, PACKED_BYTE_LENGTH } from './MatrixConfig.ts'
import { MatrixContractError } from './MatrixErrors.ts'
import type { Mat4, PackedMat4, Vec4 } from './types.ts'

/**
 * Encode a structured matrix into its 128-byte packed form
 */
export function toPacked(m: Mat4): PackedMat4 {
  const bytes = new Uint8Array(PACKED_BYTE_LENGTH)
  const view = new DataView(bytes.buffer)

  let offset = 0
  for (const row of m) {
    for (const value of row) {
      view.setFloat64(offset, value, LITTLE_ENDIAN)
      offset += CELL_BYTES
    }
  }

  return bytes
}

/**
 * Decode a packed matrix into its structured form
 * @throws MatrixContractError if the buffer is not exactly 128 bytes
 */
export function toStructured(bytes: PackedMat4): Mat4 {
  if (bytes.byteLength !== PACKED_BYTE_LENGTH) {
    SafeConsole.debug(`MatrixCodec: rejected ${bytes.byteLength}-byte buffer`)
    throw new MatrixContractError(
      `Packed matrix must be ${PACKED_BYTE_LENGTH} bytes, got ${bytes.byteLength}`
    )
  }

  // The view must honour byteOffset: callers may hand in a subarray
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const cell = (index: number): number => view.getFloat64(index * CELL_BYTES, LITTLE_ENDIAN)
  const row = (r: number): Vec4 => [cell(r * 4), cell(r * 4 + 1), cell(r * 4 + 2), cell(r * 4 + 3)]

  return [row(0), row(1), row(2), row(3)]
}

/**
 * Check if a value has the shape of a packed matrix
 */
export function isPackedMatrix(value: unknown): value is PackedMat4 {
  return value instanceof Uint8Array && value.byteLength === PACKED_BYTE_LENGTH
}

/**
 * The 16 cells as a Float64Array in packed order (for typed uploads)
 */
export function toFloat64Array(m: Mat4): Float64Array {
  return new Float64Array([...m[0], ...m[1], ...m[2], ...m[3]])
}

// =============================================================================
// Constants
// =============================================================================

function freezeMatrix(m: Mat4): Mat4 {
  for (const row of m) {
    Object.freeze(row)
  }
  return Object.freeze(m)
}

/** All sixteen cells 0 */
export const ZERO: Mat4 = freezeMatrix([
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
])

/** Ones on the diagonal */
export const IDENTITY: Mat4 = freezeMatrix([
  [1, 0, 0, 0],
  [0, 1, 0, 0],
  [0, 0, 1, 0],
  [0, 0, 0, 1],
])

const PACKED_ZERO = toPacked(ZERO)
const PACKED_IDENTITY = toPacked(IDENTITY)

/**
 * Packed zero matrix. Typed arrays cannot be frozen, so each call gets
 * its own copy of the precomputed bytes.
 */
export function packedZero(): PackedMat4 {
  return PACKED_ZERO.slice()
}

/**
 * Packed identity matrix (fresh copy, see packedZero)
 */
export function packedIdentity(): PackedMat4 {
  return PACKED_IDENTITY.slice()
}
