export type { NoteEvent, ChordEvent, TimedPitch } from './notes'

export type { ChordQuality, ChordLabel } from './chords'

export type {
  SixStrings,
  FretPosition,
  ChordShape,
  StringPitch,
  PositionedVoicing,
  UnpositionedVoicing,
  Voicing,
} from './voicing'

export type {
  StrumPattern,
  TargetInstrument,
  ArrangementStyle,
  ArrangementOptions,
  ResolvedArrangementOptions,
  ArrangedChord,
  ArrangementResult,
} from './arrangement'
