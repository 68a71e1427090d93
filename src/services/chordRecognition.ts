import { Note } from 'tonal'
import type { ChordLabel, ChordQuality } from '../domain/types'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

// Sharps-only pitch class names (C=0 ... B=11)
const PC_NAMES: readonly string[] = Object.freeze(
  Array.from({ length: 12 }, (_, pc) => Note.pitchClass(Note.fromMidiSharps(60 + pc)))
)

export interface ChordTemplate {
  quality: Exclude<ChordQuality, 'unknown'>
  suffix: string
  intervals: readonly number[]
}

function template(quality: ChordTemplate['quality'], suffix: string, intervals: number[]): ChordTemplate {
  return Object.freeze({ quality, suffix, intervals: Object.freeze(intervals) })
}

/**
 * Interval templates in match priority order. Major is tested before the
 * dominant seventh, so a full dominant seventh is labelled major.
 */
export const CHORD_TEMPLATES: readonly ChordTemplate[] = Object.freeze([
  template('major', '', [0, 4, 7]),
  template('minor', 'm', [0, 3, 7]),
  template('dominant7', '7', [0, 4, 7, 10]),
])

export const NO_CHORD: Readonly<ChordLabel> = Object.freeze({
  rootPitchClass: null,
  quality: 'unknown',
  name: 'N',
} satisfies ChordLabel)

// ─────────────────────────────────────────────────────────────────────────────
// Naming
// ─────────────────────────────────────────────────────────────────────────────

export function pitchClassName(pitchClass: number): string {
  return PC_NAMES[((pitchClass % 12) + 12) % 12]
}

/**
 * Build a chord symbol: "C" (major/unknown), "Cm" (minor), "C7" (dominant 7th).
 */
export function chordName(rootPitchClass: number, quality: ChordQuality): string {
  const template = CHORD_TEMPLATES.find((t) => t.quality === quality)
  return pitchClassName(rootPitchClass) + (template?.suffix ?? '')
}

// ─────────────────────────────────────────────────────────────────────────────
// Recognition
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Distinct pitch classes of a pitch list, ascending.
 */
export function toPitchClasses(pitches: readonly number[]): number[] {
  const classes = new Set(pitches.map((p) => ((p % 12) + 12) % 12))
  return [...classes].sort((a, b) => a - b)
}

function matchTemplate(pitchClasses: readonly number[], root: number): ChordTemplate | undefined {
  const intervals = new Set(pitchClasses.map((pc) => (pc - root + 12) % 12))
  return CHORD_TEMPLATES.find((template) => template.intervals.every((i) => intervals.has(i)))
}

/**
 * Recognize a chord from its pitches. Durations and velocities play no part.
 *
 * Bass notes and inversions are not modelled: root candidates are the present
 * pitch classes tried from the lowest upward, and the first candidate with a
 * matching template wins. With no match at all, the lowest pitch class is
 * returned as a bare root name with quality 'unknown'. Non-integer pitches
 * are ignored.
 */
export function recognizeChord(pitches: readonly number[]): ChordLabel {
  const midiPitches = pitches.filter(Number.isInteger)
  if (midiPitches.length === 0) return { ...NO_CHORD }

  const pitchClasses = toPitchClasses(midiPitches)

  for (const root of pitchClasses) {
    const template = matchTemplate(pitchClasses, root)
    if (template) {
      return {
        rootPitchClass: root,
        quality: template.quality,
        name: pitchClassName(root) + template.suffix,
      }
    }
  }

  const lowest = pitchClasses[0]
  return {
    rootPitchClass: lowest,
    quality: 'unknown',
    name: pitchClassName(lowest),
  }
}
