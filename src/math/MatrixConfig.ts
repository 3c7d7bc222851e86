/**
 * Matrix library constants.
 *
 * Packed layout: 16 float64 cells, little-endian, written row by row in
 * the order of the structured form (m[0][0], m[0][1], ... m[3][3]).
 */

import type { MatrixFormat } from './types.ts'

/** Representation returned when a caller does not name one */
export const DEFAULT_FORMAT: MatrixFormat = 'packed'

/** Per-cell tolerance used by approxEqual */
export const DEFAULT_TOLERANCE = 1e-6

/** Bytes per packed cell (IEEE-754 double) */
export const CELL_BYTES = 8

/** Cells in a 4x4 matrix */
export const CELL_COUNT = 16

/** Total size of a packed matrix */
export const PACKED_BYTE_LENGTH = CELL_BYTES * CELL_COUNT

/** Byte order of packed cells */
export const LITTLE_ENDIAN = true
