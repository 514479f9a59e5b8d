/**
 * ChordPro line aligner
 *
 * Turns one line of inline-chord markup ("[G]Hello [C]World") into a chord row and a lyric row
 * meant to be printed one above the other in a monospace font:
 *
 *   G     C
 *   Hello World
 */

export interface ChordProToken {
  /** Bracket contents without the brackets; absent for text before the first chord */
  readonly chord?: string | undefined
  readonly lyric: string
}

export interface AlignedLine {
  /** Empty when the line carries no chords */
  readonly chordRow: string
  readonly lyricRow: string
}

function makeToken(chord: string | undefined, lyric: string): ChordProToken {
  return chord === undefined ? { lyric } : { chord, lyric }
}

const isEmptyToken = (chord: string | undefined, lyric: string): boolean =>
  !chord && lyric === ""

/** Column width in code points, so astral characters count once */
const columnWidth = (text: string): number => [...text].length

const padColumn = (text: string, width: number): string =>
  text + " ".repeat(width - columnWidth(text))

/**
 * Split a line into (chord, lyric run) pairs. A "[" without a closing "]" is kept as lyric text;
 * an empty "[]" with no lyric after it yields no token.
 */
export function tokenizeChordProLine(line: string): ChordProToken[] {
  const tokens: ChordProToken[] = []
  let chord: string | undefined
  let lyric = ""
  let cursor = 0

  while (cursor < line.length) {
    const open = line.indexOf("[", cursor)
    const close = open === -1 ? -1 : line.indexOf("]", open + 1)
    if (close === -1) {
      lyric += line.slice(cursor)
      break
    }

    lyric += line.slice(cursor, open)
    if (!isEmptyToken(chord, lyric)) {
      tokens.push(makeToken(chord, lyric))
    }

    chord = line.slice(open + 1, close)
    lyric = ""
    cursor = close + 1
  }

  if (!isEmptyToken(chord, lyric)) {
    tokens.push(makeToken(chord, lyric))
  }

  return tokens
}

export function extractChordLabels(line: string): string[] {
  return tokenizeChordProLine(line).flatMap(token =>
    token.chord !== undefined && token.chord !== "" ? [token.chord] : [],
  )
}

/**
 * Align chords over lyrics: each token is padded to the wider of its chord and its lyric run,
 * so every chord starts at the column where its lyric fragment starts.
 */
export function alignChordProLine(line: string): AlignedLine {
  let chordRow = ""
  let lyricRow = ""

  for (const token of tokenizeChordProLine(line)) {
    const chord = token.chord ?? ""
    const width = Math.max(columnWidth(chord), columnWidth(token.lyric))
    chordRow += padColumn(chord, width)
    lyricRow += padColumn(token.lyric, width)
  }

  return {
    chordRow: chordRow.trim() ? chordRow : "",
    lyricRow,
  }
}
