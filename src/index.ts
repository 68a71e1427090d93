export type * from './domain/types'

export {
  sanitizeNoteEvents,
  isPlayableNote,
  clampVelocity,
} from './services/noteValidation'
export type { SanitizedNotes } from './services/noteValidation'

export {
  groupNotesByOnset,
  chordEventPitches,
  DEFAULT_CHORD_GROUPING_TOLERANCE,
} from './services/noteGrouping'

export {
  recognizeChord,
  chordName,
  pitchClassName,
  toPitchClasses,
  CHORD_TEMPLATES,
  NO_CHORD,
} from './services/chordRecognition'
export type { ChordTemplate } from './services/chordRecognition'

export {
  getChordVoicing,
  getChordVariantCount,
  listChordNames,
  shapeToPitches,
  fallbackVoicing,
  selectImportantPitches,
  foldIntoGuitarRange,
  resolveVoicing,
  voicingPitches,
  STANDARD_TUNING,
  CHORD_SHAPES,
  MUTED,
  GUITAR_MIN_MIDI,
  GUITAR_MAX_MIDI,
  MAX_VOICING_NOTES,
} from './services/fretboard'

export { createSeededRandom, uniform } from './services/random'
export type { RandomSource } from './services/random'

export {
  applyStrumPattern,
  applyVelocityVariation,
  humanizeChord,
  isStrumPattern,
  toStrumPattern,
  STRUM_PATTERNS,
  DEFAULT_VELOCITY_VARIATION,
} from './services/strumming'
export type { StrumOptions, VelocityOptions } from './services/strumming'

export {
  arrangeForGuitar,
  voiceChordEvents,
  resolveArrangementOptions,
  strumPatternForStyle,
  describeChords,
  ArrangementConfigError,
  SUPPORTED_INSTRUMENTS,
  DEFAULT_STYLE,
} from './services/arrangement'
