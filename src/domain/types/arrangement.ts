import type { ChordLabel } from './chords'
import type { NoteEvent } from './notes'
import type { Voicing } from './voicing'

/**
 * Strum timing policy for one chord.
 * - 'down': low to high strings
 * - 'up': high to low strings
 * - 'down_up': a down strum then an up strum, each over half the duration
 * - 'block': every string at once
 */
export type StrumPattern = 'down' | 'up' | 'down_up' | 'block'

export type TargetInstrument = 'guitar'

/** Styles with a preset strum pattern; any other string falls back to 'down' */
export type ArrangementStyle = 'folk' | 'rock' | 'fingerstyle'

export interface ArrangementOptions {
  targetInstrument?: string
  style?: ArrangementStyle | (string & {})
  /** Overrides the pattern implied by `style` */
  strumPattern?: string
  chordGroupingTolerance?: number
  humanize?: boolean
  velocityVariation?: number
  /** Preferred shape variant for table voicings (wraps to 0 when missing) */
  voicingVariant?: number
  /** Seed for a deterministic random stream; ignored when `random` is set */
  seed?: number
  random?: () => number
  /** Log one line per voiced chord */
  debug?: boolean
}

export interface ResolvedArrangementOptions {
  targetInstrument: TargetInstrument
  style: string
  strumPattern: StrumPattern
  chordGroupingTolerance: number
  humanize: boolean
  velocityVariation: number
  voicingVariant: number
  random: () => number
  debug: boolean
}

export interface ArrangedChord {
  start: number
  label: ChordLabel
  voicing: Voicing
  notes: NoteEvent[]
}

export interface ArrangementResult {
  /** Final note stream, in chord order */
  notes: NoteEvent[]
  chords: ArrangedChord[]
  strumPattern: StrumPattern
  noteCount: number
  /** Latest note end time, 0 when there are no notes */
  durationSec: number
  range: {
    minMidi: number
    maxMidi: number
  } | null
  /** Input notes rejected by validation */
  droppedNotes: NoteEvent[]
}
