/**
 * Chord voicing model
 *
 * A ChordShape describes one six-string guitar voicing with absolute fret numbers. Shapes are
 * validated once, here, so the diagram engine can treat every shape it receives as well formed.
 */

import { ChordShapeError } from "@/lib/errors"
import { Effect, Either } from "effect"

export const STRING_COUNT = 6
export const MAX_FRET = 24
export const MAX_FINGER = 4

export const MUTED = -1
export const OPEN = 0

export interface ChordShape {
  readonly name: string
  /** One entry per string, lowest pitch first: -1 muted, 0 open, 1..24 fretted */
  readonly frets: readonly number[]
  /** One entry per string, 0 for no finger label */
  readonly fingers?: readonly number[] | undefined
  readonly barre?: number | undefined
  readonly baseFret: number
}

export interface ChordShapeInput {
  readonly name: string
  readonly frets: readonly number[]
  readonly fingers?: readonly number[] | null | undefined
  readonly barre?: number | null | undefined
  readonly baseFret?: number | null | undefined
}

const fail = (chord: string, field: ChordShapeError["field"], message: string) =>
  Either.left(new ChordShapeError({ chord, field, message }))

const isIntegerInRange = (value: number, min: number, max: number): boolean =>
  Number.isInteger(value) && value >= min && value <= max

/**
 * Validate raw voicing data into a ChordShape
 */
export function decodeChordShape(input: ChordShapeInput): Either.Either<ChordShape, ChordShapeError> {
  const name = input.name.trim()
  if (!name) {
    return fail(input.name, "name", "Chord name must not be empty")
  }

  if (input.frets.length !== STRING_COUNT) {
    return fail(name, "frets", `Must have exactly ${STRING_COUNT} fret positions (one per string)`)
  }
  if (!input.frets.every(fret => isIntegerInRange(fret, MUTED, MAX_FRET))) {
    return fail(name, "frets", `Fret must be -1 (muted), 0 (open), or 1-${MAX_FRET}`)
  }

  const fingers = input.fingers ?? undefined
  if (fingers !== undefined) {
    if (fingers.length !== STRING_COUNT) {
      return fail(name, "fingers", `Must have exactly ${STRING_COUNT} finger entries (one per string)`)
    }
    if (!fingers.every(finger => isIntegerInRange(finger, 0, MAX_FINGER))) {
      return fail(name, "fingers", `Finger must be 0 (none) or 1-${MAX_FINGER}`)
    }
  }

  const barre = input.barre ?? undefined
  if (barre !== undefined && !isIntegerInRange(barre, 1, MAX_FRET)) {
    return fail(name, "barre", `Barre fret must be 1-${MAX_FRET}`)
  }

  const baseFret = input.baseFret ?? 1
  if (!isIntegerInRange(baseFret, 1, MAX_FRET)) {
    return fail(name, "baseFret", `Base fret must be 1-${MAX_FRET}`)
  }

  return Either.right({
    name,
    frets: [...input.frets],
    ...(fingers !== undefined ? { fingers: [...fingers] } : {}),
    ...(barre !== undefined ? { barre } : {}),
    baseFret,
  })
}

export const makeChordShape = (input: ChordShapeInput): Effect.Effect<ChordShape, ChordShapeError> =>
  Either.match(decodeChordShape(input), {
    onLeft: error => Effect.fail(error),
    onRight: shape => Effect.succeed(shape),
  })

/**
 * Row inside a diagram whose top row shows `baseFret` (1-based)
 */
export function displayRow(fret: number, baseFret: number): number {
  return fret - baseFret + 1
}
