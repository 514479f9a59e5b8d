/**
 * Centralized error definitions for the data-model boundary and the render service
 *
 * The diagram engine and the line aligner are total and never fail; every error below is raised
 * while constructing input values or resolving chords by name.
 */

import { Data } from "effect"

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * A chord voicing failed validation (wrong string count, fret out of range, etc.)
 */
export class ChordShapeError extends Data.TaggedError("ChordShapeError")<{
  readonly chord: string
  readonly field: "name" | "frets" | "fingers" | "barre" | "baseFret"
  readonly message: string
}> {}

/**
 * Song metadata or structure failed validation
 */
export class SongValidationError extends Data.TaggedError("SongValidationError")<{
  readonly field: string
  readonly message: string
}> {}

export type ValidationErrors = ChordShapeError | SongValidationError

// ============================================================================
// Lookup Errors
// ============================================================================

/**
 * No voicing is known for the chord name (song, common library and chord database all missed)
 */
export class ChordNotFoundError extends Data.TaggedError("ChordNotFoundError")<{
  readonly name: string
}> {}

export type LookupErrors = ChordNotFoundError

/**
 * All errors raised by the library
 */
export type FretsheetError = ValidationErrors | LookupErrors
