// ─────────────────────────────────────────────────────────────────────────────
// Strumming: Stagger chord onsets and vary velocity like a human player
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent, StrumPattern, TimedPitch } from '../domain/types'
import { uniform } from './random'
import type { RandomSource } from './random'

// Per-string delay while humanizing, plus jitter drawn from [MIN, MAX)
export const STRUM_STRING_DELAY = 0.008
export const STRUM_JITTER_MIN = 0.002
export const STRUM_JITTER_MAX = 0.007

// Per-string delay without humanization
export const MECHANICAL_STRING_DELAY = 0.01

export const DEFAULT_VELOCITY_VARIATION = 0.15

// Velocity floor keeps every strummed string audible
export const MIN_STRUM_VELOCITY = 40
export const MAX_STRUM_VELOCITY = 127

export const STRUM_PATTERNS: readonly StrumPattern[] = ['down', 'up', 'down_up', 'block']

export function isStrumPattern(value: string): value is StrumPattern {
  return STRUM_PATTERNS.some((pattern) => pattern === value)
}

/**
 * Unrecognized pattern names strum as a block chord.
 */
export function toStrumPattern(value: string): StrumPattern {
  return isStrumPattern(value) ? value : 'block'
}

export interface StrumOptions {
  humanize?: boolean
  random?: RandomSource
}

export interface VelocityOptions {
  variation?: number
  random?: RandomSource
}

// ─────────────────────────────────────────────────────────────────────────────
// Timing
// ─────────────────────────────────────────────────────────────────────────────

function stringDelay(index: number, humanize: boolean, random: RandomSource): number {
  if (!humanize) return index * MECHANICAL_STRING_DELAY
  return index * STRUM_STRING_DELAY + uniform(random, STRUM_JITTER_MIN, STRUM_JITTER_MAX)
}

function strum(
  ordered: readonly TimedPitch[],
  offset: (note: TimedPitch) => number,
  duration: (note: TimedPitch) => number,
  humanize: boolean,
  random: RandomSource
): TimedPitch[] {
  return ordered.map((note, i) => ({
    pitch: note.pitch,
    start: note.start + offset(note) + stringDelay(i, humanize, random),
    duration: duration(note),
  }))
}

/**
 * Offset note onsets according to a strum pattern.
 *
 * - down: lowest pitch first
 * - up: highest pitch first
 * - down_up: a down strum over the first half of each note, then an up strum
 *   starting at the half-way point
 * - block: onsets untouched
 *
 * Output follows strum order, not input order.
 */
export function applyStrumPattern(
  notes: readonly TimedPitch[],
  pattern: StrumPattern,
  options: StrumOptions = {}
): TimedPitch[] {
  const { humanize = true, random = Math.random } = options
  if (notes.length === 0) return []

  const ascending = [...notes].sort((a, b) => a.pitch - b.pitch)
  const descending = [...ascending].reverse()
  const none = () => 0
  const whole = (note: TimedPitch) => note.duration
  const half = (note: TimedPitch) => note.duration / 2

  switch (pattern) {
    case 'down':
      return strum(ascending, none, whole, humanize, random)
    case 'up':
      return strum(descending, none, whole, humanize, random)
    case 'down_up':
      return [
        ...strum(ascending, none, half, humanize, random),
        ...strum(descending, half, half, humanize, random),
      ]
    case 'block':
      return notes.map(({ pitch, start, duration }) => ({ pitch, start, duration }))
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Dynamics
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Give every note the chord's velocity, nudged by up to ±variation of it,
 * then clamped to [40, 127].
 */
export function applyVelocityVariation(
  notes: readonly TimedPitch[],
  velocity: number,
  options: VelocityOptions = {}
): NoteEvent[] {
  const { variation = DEFAULT_VELOCITY_VARIATION, random = Math.random } = options

  return notes.map((note) => {
    const amount = Math.round(velocity * variation * uniform(random, -1, 1))
    return {
      pitch: note.pitch,
      start: note.start,
      duration: note.duration,
      velocity: Math.max(MIN_STRUM_VELOCITY, Math.min(MAX_STRUM_VELOCITY, velocity + amount)),
    }
  })
}

/**
 * Strum one chord and vary its dynamics. Muted strings must already be removed.
 */
export function humanizeChord(
  notes: readonly TimedPitch[],
  velocity: number,
  pattern: StrumPattern,
  options: StrumOptions & VelocityOptions = {}
): NoteEvent[] {
  const strummed = applyStrumPattern(notes, pattern, options)
  return applyVelocityVariation(strummed, velocity, options)
}
