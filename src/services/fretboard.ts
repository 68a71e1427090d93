// ─────────────────────────────────────────────────────────────────────────────
// Fretboard: Standard tuning, chord shape table, and voicing resolution
// ─────────────────────────────────────────────────────────────────────────────

import type {
  ChordLabel,
  ChordShape,
  PositionedVoicing,
  SixStrings,
  StringPitch,
  UnpositionedVoicing,
  Voicing,
} from '../domain/types'

// Open strings, low E (E2) to high E (E4)
export const STANDARD_TUNING: SixStrings<number> = Object.freeze([40, 45, 50, 55, 59, 64] as const)

export const MUTED = null

// Practical guitar range for fallback voicings (E2-E5)
export const GUITAR_MIN_MIDI = 40
export const GUITAR_MAX_MIDI = 76

// Six strings, so at most six simultaneous notes
export const MAX_VOICING_NOTES = 6

// Common open and barre shapes. 'x' = string not played.
const CHORD_SHAPE_ENTRIES: ReadonlyArray<readonly [string, readonly ChordShape[]]> = [
  ['C', [['x', 3, 2, 0, 1, 0], [0, 3, 2, 0, 1, 0]]],
  ['Cmaj7', [[0, 3, 2, 0, 0, 0]]],
  ['C7', [[0, 3, 2, 3, 1, 0]]],
  ['D', [['x', 'x', 0, 2, 3, 2]]],
  ['Dm', [['x', 'x', 0, 2, 3, 1]]],
  ['D7', [['x', 'x', 0, 2, 1, 2]]],
  ['E', [[0, 2, 2, 1, 0, 0]]],
  ['Em', [[0, 2, 2, 0, 0, 0]]],
  ['E7', [[0, 2, 0, 1, 0, 0]]],
  ['F', [[1, 3, 3, 2, 1, 1]]],
  ['Fm', [[1, 3, 3, 1, 1, 1]]],
  ['G', [[3, 2, 0, 0, 0, 3], [3, 2, 0, 0, 3, 3]]],
  ['Gm', [[3, 5, 5, 3, 3, 3]]],
  ['G7', [[3, 2, 0, 0, 0, 1]]],
  ['A', [['x', 0, 2, 2, 2, 0]]],
  ['Am', [['x', 0, 2, 2, 1, 0]]],
  ['A7', [['x', 0, 2, 0, 2, 0]]],
  ['B', [['x', 2, 4, 4, 4, 2]]],
  ['Bm', [['x', 2, 4, 4, 3, 2]]],
  ['B7', [['x', 2, 1, 2, 0, 2]]],
]

const freezeShape = (shape: ChordShape): ChordShape => Object.freeze(shape)

// Shape arrays are frozen; the map is only exposed through ReadonlyMap
export const CHORD_SHAPES: ReadonlyMap<string, readonly ChordShape[]> = new Map(
  CHORD_SHAPE_ENTRIES.map(([name, shapes]): [string, readonly ChordShape[]] => [
    name,
    Object.freeze(shapes.map(freezeShape)),
  ])
)

// ─────────────────────────────────────────────────────────────────────────────
// Table Lookup
// ─────────────────────────────────────────────────────────────────────────────

export function listChordNames(): string[] {
  return [...CHORD_SHAPES.keys()]
}

export function getChordVariantCount(chordName: string): number {
  return CHORD_SHAPES.get(chordName)?.length ?? 0
}

/**
 * Resolve a fret shape against standard tuning.
 */
export function shapeToPitches(shape: ChordShape): SixStrings<StringPitch> {
  const [e, a, d, g, b, hiE] = shape.map((fret, string) =>
    fret === 'x' ? MUTED : STANDARD_TUNING[string] + fret
  )
  return [e, a, d, g, b, hiE]
}

/**
 * Look up a chord in the shape table.
 * A variant the chord does not have silently falls back to variant 0.
 *
 * @returns The positioned voicing, or null when the chord is not in the table
 */
export function getChordVoicing(chordName: string, variant: number = 0): PositionedVoicing | null {
  const shapes = CHORD_SHAPES.get(chordName)
  if (!shapes || shapes.length === 0) return null

  const index = Number.isInteger(variant) && variant >= 0 && variant < shapes.length ? variant : 0

  return {
    kind: 'positioned',
    chordName,
    variant: index,
    strings: shapeToPitches(shapes[index]),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Fallback Voicing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keep the lowest and highest pitch, then sample the middle evenly.
 * Input must be sorted ascending and free of duplicates. With room for a
 * single note only the lowest is kept.
 */
export function selectImportantPitches(
  pitches: readonly number[],
  maxNotes: number = MAX_VOICING_NOTES
): number[] {
  if (pitches.length <= maxNotes) return [...pitches]
  if (maxNotes < 2) return pitches.slice(0, Math.max(0, maxNotes))

  const selected = [pitches[0], pitches[pitches.length - 1]]
  const remainingSlots = maxNotes - 2
  const middle = pitches.slice(1, -1)

  if (remainingSlots > 0 && middle.length > 0) {
    const step = middle.length / remainingSlots
    for (let i = 0; i < remainingSlots; i++) {
      selected.push(middle[Math.floor(i * step)])
    }
  }

  return selected.sort((a, b) => a - b)
}

const mod12 = (value: number) => ((value % 12) + 12) % 12

/**
 * Move a pitch by the fewest octaves that bring it into the guitar's
 * practical range. Non-finite pitches come back as NaN.
 */
export function foldIntoGuitarRange(pitch: number): number {
  if (!Number.isFinite(pitch)) return Number.NaN
  if (pitch < GUITAR_MIN_MIDI) return GUITAR_MIN_MIDI + mod12(pitch - GUITAR_MIN_MIDI)
  if (pitch > GUITAR_MAX_MIDI) return GUITAR_MAX_MIDI - mod12(GUITAR_MAX_MIDI - pitch)
  return pitch
}

/**
 * Approximate voicing for chords the shape table does not cover.
 * Strings are not assigned, so the result is not guaranteed to be playable.
 * Non-finite pitches are ignored.
 */
export function fallbackVoicing(pitches: readonly number[]): UnpositionedVoicing {
  const distinct = [...new Set(pitches.filter(Number.isFinite))].sort((a, b) => a - b)
  const selected = selectImportantPitches(distinct)

  return {
    kind: 'unpositioned',
    pitches: selected.map(foldIntoGuitarRange),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Table voicing when the label has one, fallback voicing otherwise.
 */
export function resolveVoicing(
  label: ChordLabel,
  pitches: readonly number[],
  variant: number = 0
): Voicing {
  if (label.name !== 'N') {
    const positioned = getChordVoicing(label.name, variant)
    if (positioned) return positioned
  }
  return fallbackVoicing(pitches)
}

/**
 * Sounding pitches of a voicing, low string first. Muted strings are skipped.
 */
export function voicingPitches(voicing: Voicing): number[] {
  if (voicing.kind === 'unpositioned') return [...voicing.pitches]
  return voicing.strings.filter((pitch): pitch is number => pitch !== MUTED)
}
