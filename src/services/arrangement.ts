import { Note } from 'tonal'
import type {
  ArrangedChord,
  ArrangementOptions,
  ArrangementResult,
  ChordEvent,
  NoteEvent,
  ResolvedArrangementOptions,
  StrumPattern,
  TimedPitch,
} from '../domain/types'
import { recognizeChord } from './chordRecognition'
import { resolveVoicing, voicingPitches } from './fretboard'
import { chordEventPitches, groupNotesByOnset, DEFAULT_CHORD_GROUPING_TOLERANCE } from './noteGrouping'
import { sanitizeNoteEvents } from './noteValidation'
import { createSeededRandom } from './random'
import { humanizeChord, toStrumPattern, DEFAULT_VELOCITY_VARIATION } from './strumming'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const SUPPORTED_INSTRUMENTS = ['guitar'] as const

export const DEFAULT_STYLE = 'folk'

// Style presets (style -> strum pattern). Unknown styles strum down.
const STYLE_STRUM_PATTERNS: ReadonlyMap<string, StrumPattern> = new Map<string, StrumPattern>([
  ['folk', 'down'],
  ['rock', 'down_up'],
  ['fingerstyle', 'down'],
])

const DEFAULT_STRUM_PATTERN: StrumPattern = 'down'

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Thrown for caller configuration that cannot be honoured. Musical edge cases
 * (empty chords, unknown chord names) never raise this.
 */
export class ArrangementConfigError extends Error {
  readonly field: keyof ArrangementOptions

  constructor(field: keyof ArrangementOptions, message: string) {
    super(`Invalid arrangement option "${field}": ${message}`)
    this.name = 'ArrangementConfigError'
    this.field = field
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Option Resolution
// ─────────────────────────────────────────────────────────────────────────────

export function strumPatternForStyle(style: string): StrumPattern {
  return STYLE_STRUM_PATTERNS.get(style) ?? DEFAULT_STRUM_PATTERN
}

function isSupportedInstrument(value: string): value is (typeof SUPPORTED_INSTRUMENTS)[number] {
  return SUPPORTED_INSTRUMENTS.some((instrument) => instrument === value)
}

/**
 * Validate caller options and fill in defaults.
 * @throws ArrangementConfigError naming the first offending field
 */
export function resolveArrangementOptions(options: ArrangementOptions = {}): ResolvedArrangementOptions {
  const {
    targetInstrument = 'guitar',
    style = DEFAULT_STYLE,
    strumPattern,
    chordGroupingTolerance = DEFAULT_CHORD_GROUPING_TOLERANCE,
    humanize = true,
    velocityVariation = DEFAULT_VELOCITY_VARIATION,
    voicingVariant = 0,
    seed,
    random,
    debug = false,
  } = options

  if (!isSupportedInstrument(targetInstrument)) {
    throw new ArrangementConfigError(
      'targetInstrument',
      `unsupported instrument "${targetInstrument}" (supported: ${SUPPORTED_INSTRUMENTS.join(', ')})`
    )
  }
  if (!Number.isFinite(chordGroupingTolerance) || chordGroupingTolerance < 0) {
    throw new ArrangementConfigError('chordGroupingTolerance', 'must be a non-negative number of seconds')
  }
  if (!Number.isFinite(velocityVariation) || velocityVariation < 0 || velocityVariation > 1) {
    throw new ArrangementConfigError('velocityVariation', 'must be between 0 and 1')
  }
  if (!Number.isInteger(voicingVariant) || voicingVariant < 0) {
    throw new ArrangementConfigError('voicingVariant', 'must be a non-negative integer')
  }
  if (seed !== undefined && !Number.isFinite(seed)) {
    throw new ArrangementConfigError('seed', 'must be a finite number')
  }

  return {
    targetInstrument,
    style,
    strumPattern: strumPattern === undefined ? strumPatternForStyle(style) : toStrumPattern(strumPattern),
    chordGroupingTolerance,
    humanize,
    velocityVariation,
    voicingVariant,
    random: random ?? (seed === undefined ? Math.random : createSeededRandom(seed)),
    debug,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

function voiceChordEvent(event: ChordEvent, options: ResolvedArrangementOptions): ArrangedChord {
  const pitches = chordEventPitches(event)
  const label = recognizeChord(pitches)
  const voicing = resolveVoicing(label, pitches, options.voicingVariant)

  // Empty event: nothing to strum
  const [first] = event.notes
  if (!first) {
    return { start: event.start, label, voicing, notes: [] }
  }

  const strings: TimedPitch[] = voicingPitches(voicing).map((pitch) => ({
    pitch,
    start: event.start,
    duration: first.duration,
  }))

  const notes = humanizeChord(strings, first.velocity, options.strumPattern, {
    humanize: options.humanize,
    variation: options.velocityVariation,
    random: options.random,
  })

  if (options.debug) {
    console.log('[Arrangement] Voiced chord:', {
      start: event.start.toFixed(3),
      label: label.name,
      voicing: voicing.kind,
      notes: notes.length,
    })
  }

  return { start: event.start, label, voicing, notes }
}

function warnDropped(dropped: readonly NoteEvent[]): void {
  if (dropped.length > 0) {
    console.warn(`[Arrangement] Dropped ${dropped.length} unplayable note(s)`)
  }
}

function summarize(
  chords: ArrangedChord[],
  strumPattern: StrumPattern,
  droppedNotes: NoteEvent[]
): ArrangementResult {
  const notes = chords.flatMap((chord) => chord.notes)

  let range: ArrangementResult['range'] = null
  let durationSec = 0
  for (const note of notes) {
    durationSec = Math.max(durationSec, note.start + note.duration)
    range = range
      ? { minMidi: Math.min(range.minMidi, note.pitch), maxMidi: Math.max(range.maxMidi, note.pitch) }
      : { minMidi: note.pitch, maxMidi: note.pitch }
  }

  return {
    notes,
    chords,
    strumPattern,
    noteCount: notes.length,
    durationSec,
    range,
    droppedNotes,
  }
}

/**
 * Voice chord events that are already grouped, in the order given.
 * Unplayable notes are dropped from each event before it is voiced.
 * Each chord's notes are reordered by the strum; the stream is not re-sorted.
 */
export function voiceChordEvents(
  events: readonly ChordEvent[],
  options: ArrangementOptions = {}
): ArrangementResult {
  const resolved = resolveArrangementOptions(options)

  const droppedNotes: NoteEvent[] = []
  const chords = events.map((event) => {
    const { notes, dropped } = sanitizeNoteEvents(event.notes)
    droppedNotes.push(...dropped)
    return voiceChordEvent({ start: event.start, notes }, resolved)
  })
  warnDropped(droppedNotes)

  return summarize(chords, resolved.strumPattern, droppedNotes)
}

/**
 * Turn a piano-style note stream into a strummed guitar part:
 * 1. Drop unplayable notes (bad pitch, start, duration, or velocity)
 * 2. Group notes into chord events by onset
 * 3. Recognize each chord and map it onto the fretboard
 * 4. Strum and humanize each chord
 */
export function arrangeForGuitar(
  notes: readonly NoteEvent[],
  options: ArrangementOptions = {}
): ArrangementResult {
  const resolved = resolveArrangementOptions(options)

  const { notes: playable, dropped } = sanitizeNoteEvents(notes)
  warnDropped(dropped)

  const events = groupNotesByOnset(playable, resolved.chordGroupingTolerance)
  const chords = events.map((event) => voiceChordEvent(event, resolved))

  return summarize(chords, resolved.strumPattern, dropped)
}

// ─────────────────────────────────────────────────────────────────────────────
// Reporting
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One line per chord: onset, label, and the sounding notes in strum order.
 * e.g. "0.00s  C     C3 E3 G3 C4 E4"
 */
export function describeChords(result: ArrangementResult): string[] {
  return result.chords.map((chord) => {
    const names = chord.notes.map((note) => Note.fromMidiSharps(note.pitch))
    const line = `${chord.start.toFixed(2)}s  ${chord.label.name.padEnd(5)} ${names.join(' ')}`
    return line.trimEnd()
  })
}
