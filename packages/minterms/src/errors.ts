/**
 * Base error class for classifier faults.
 */
export class ClassifierError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ClassifierError'
  }
}

/**
 * Raised while building a classifier from a malformed partition: no classes,
 * ranges handed to the default class, ranges outside the code unit domain,
 * unsorted ranges, or two classes claiming the same code. These indicate a
 * defect in the partitioning stage rather than bad user input.
 */
export class ClassifierContractError extends ClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ClassifierContractError'
  }
}

/**
 * Raised by checked lookups when the code is not a UTF-16 code unit.
 */
export class ClassifierRangeError extends ClassifierError {
  readonly code: number

  constructor(code: number, options?: ErrorOptions) {
    super(`code unit out of range: ${code}`, options)
    this.name = 'ClassifierRangeError'
    this.code = code
  }
}
