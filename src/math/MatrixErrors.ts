/**
 * Matrix Error Types
 *
 * SingularMatrixError is the one expected failure; invert() hands it back
 * inside an InvertResult. MatrixContractError marks a caller bug and is
 * always thrown.
 */

export type MatrixErrorCode = 'SINGULAR_MATRIX' | 'CONTRACT_VIOLATION'

/**
 * Base class for matrix errors
 */
export abstract class MatrixError extends Error {
  abstract readonly code: MatrixErrorCode

  constructor(message: string) {
    super(message)
    this.name = this.constructor.name
  }
}

/**
 * The matrix has a zero determinant and no inverse
 */
export class SingularMatrixError extends MatrixError {
  readonly code = 'SINGULAR_MATRIX'

  constructor(readonly determinant: number = 0) {
    super(`Matrix is singular (determinant ${determinant})`)
  }
}

/**
 * An argument broke the API contract: bad index, wrong buffer length
 */
export class MatrixContractError extends MatrixError {
  readonly code = 'CONTRACT_VIOLATION'
}
