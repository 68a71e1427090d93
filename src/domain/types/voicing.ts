/**
 * Six values, one per string, ordered low E to high E.
 */
export type SixStrings<T> = readonly [T, T, T, T, T, T]

/** A fret number, or 'x' for a string that is not played */
export type FretPosition = number | 'x'

export type ChordShape = SixStrings<FretPosition>

/** Absolute MIDI pitch per string; null marks a muted string */
export type StringPitch = number | null

/**
 * A voicing taken from the chord shape table. Every slot maps to a real
 * string, so the chord is physically playable.
 */
export interface PositionedVoicing {
  kind: 'positioned'
  chordName: string
  variant: number
  strings: SixStrings<StringPitch>
}

/**
 * A fallback voicing: pitches moved into guitar range with no string
 * assignment. Treat it as "the notes that survived", not as a fingering.
 */
export interface UnpositionedVoicing {
  kind: 'unpositioned'
  pitches: readonly number[]
}

export type Voicing = PositionedVoicing | UnpositionedVoicing
