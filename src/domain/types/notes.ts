/**
 * A single note in seconds. Pitch and velocity are MIDI values (0-127).
 */
export interface NoteEvent {
  pitch: number
  start: number
  duration: number
  velocity: number
}

/**
 * Notes judged to sound together. `start` is the onset of the first note
 * in the group, which anchors the grouping window.
 */
export interface ChordEvent {
  start: number
  notes: readonly NoteEvent[]
}

/** A note before velocity is assigned (strum input). */
export type TimedPitch = Pick<NoteEvent, 'pitch' | 'start' | 'duration'>
