// ─────────────────────────────────────────────────────────────────────────────
// Errors: every lookup or contract failure is thrown to the immediate caller
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Base class so callers can catch any failure raised by this library.
 */
export class RowAnalysisError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RowAnalysisError'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog and canonicalisation
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidCardinalityError extends RowAnalysisError {
  readonly cardinality: number

  constructor(cardinality: number) {
    super(`Invalid cardinality ${cardinality}: must be 2-10 (inclusive)`)
    this.name = 'InvalidCardinalityError'
    this.cardinality = cardinality
  }
}

export class UnknownPrimeFormError extends RowAnalysisError {
  constructor(prime: readonly number[]) {
    super(`(${prime.join(', ')}) is not a valid prime form`)
    this.name = 'UnknownPrimeFormError'
  }
}

export class UnknownIntervalVectorError extends RowAnalysisError {
  constructor(vector: readonly number[]) {
    super(`<${vector.join(', ')}> is not a valid interval vector`)
    this.name = 'UnknownIntervalVectorError'
  }
}

export class UnknownForteClassError extends RowAnalysisError {
  constructor(label: string) {
    super(`${label} is not a Forte class label`)
    this.name = 'UnknownForteClassError'
  }
}

export class NoMatchingSetClassError extends RowAnalysisError {
  constructor(pitches: readonly number[]) {
    super(`No set class matches pitches [${pitches.join(', ')}]`)
    this.name = 'NoMatchingSetClassError'
  }
}

export class InvalidEntryError extends RowAnalysisError {
  constructor(pitches: readonly number[]) {
    super(`[${pitches.join(', ')}] is not a valid entry`)
    this.name = 'InvalidEntryError'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Row classification
// ─────────────────────────────────────────────────────────────────────────────

export class InvalidSegmentLengthError extends RowAnalysisError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidSegmentLengthError'
  }
}

export class NotDerivedRowError extends RowAnalysisError {
  constructor() {
    super('Not a valid (derived) row: segments do not all share one set class')
    this.name = 'NotDerivedRowError'
  }
}

export class InvalidTransformationKindError extends RowAnalysisError {
  constructor(kind: string) {
    super(
      `Invalid transformation "${kind}": must be "T" for transposition, ` +
        '"I" for inversion, or "RI" for retrograde-inversion'
    )
    this.name = 'InvalidTransformationKindError'
  }
}

export class InvalidRowLengthError extends RowAnalysisError {
  constructor(length: number) {
    super(`Expected a 12-tone row, got ${length} pitches`)
    this.name = 'InvalidRowLengthError'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

export class RowParseError extends RowAnalysisError {
  constructor(message: string) {
    super(message)
    this.name = 'RowParseError'
  }
}
