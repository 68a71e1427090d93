import { describe, it, expect } from 'vitest'
import {
  applyStrumPattern,
  applyVelocityVariation,
  humanizeChord,
  isStrumPattern,
  toStrumPattern,
  STRUM_PATTERNS,
} from './strumming'
import { createSeededRandom } from './random'
import type { TimedPitch } from '../domain/types'

describe('strumming', () => {
  // Open C chord, deliberately out of pitch order
  const chord: TimedPitch[] = [
    { pitch: 60, start: 1, duration: 2 },
    { pitch: 48, start: 1, duration: 2 },
    { pitch: 64, start: 1, duration: 2 },
    { pitch: 52, start: 1, duration: 2 },
    { pitch: 55, start: 1, duration: 2 },
  ]
  const middle = () => 0.5

  describe('strum pattern names', () => {
    it('recognizes the four patterns', () => {
      expect(STRUM_PATTERNS).toEqual(['down', 'up', 'down_up', 'block'])
      expect(isStrumPattern('down_up')).toBe(true)
      expect(isStrumPattern('down-up')).toBe(false)
    })

    it('treats unrecognized names as block', () => {
      expect(toStrumPattern('up')).toBe('up')
      expect(toStrumPattern('shuffle')).toBe('block')
    })
  })

  describe('applyStrumPattern', () => {
    it('returns nothing for an empty chord', () => {
      expect(applyStrumPattern([], 'down')).toEqual([])
    })

    it('down: strums low to high, 10ms apart without humanization', () => {
      const result = applyStrumPattern(chord, 'down', { humanize: false })

      expect(result.map((n) => n.pitch)).toEqual([48, 52, 55, 60, 64])
      const offsets = result.map((n) => n.start - 1)
      ;[0, 0.01, 0.02, 0.03, 0.04].forEach((expected, i) => {
        expect(offsets[i]).toBeCloseTo(expected, 10)
      })
      expect(result.every((n) => n.duration === 2)).toBe(true)
    })

    it('up: strums high to low', () => {
      const result = applyStrumPattern(chord, 'up', { humanize: false })

      expect(result.map((n) => n.pitch)).toEqual([64, 60, 55, 52, 48])
      expect(result[0].start).toBe(1)
      expect(result[4].start).toBeCloseTo(1.04, 10)
    })

    it('adds 8ms per string plus jitter when humanizing', () => {
      const result = applyStrumPattern(chord, 'down', { humanize: true, random: middle })

      // jitter = 0.002 + 0.005 * 0.5
      expect(result[0].start).toBeCloseTo(1.0045, 10)
      expect(result[1].start).toBeCloseTo(1.0125, 10)
      expect(result[4].start).toBeCloseTo(1.0365, 10)
    })

    it('keeps jitter within 2-7ms', () => {
      const low = applyStrumPattern(chord, 'down', { random: () => 0 })
      const high = applyStrumPattern(chord, 'down', { random: () => 0.999999 })

      expect(low[0].start - 1).toBeCloseTo(0.002, 10)
      expect(high[0].start - 1).toBeCloseTo(0.007, 5)
    })

    it('down_up: strums down then up, each over half the duration', () => {
      const result = applyStrumPattern(chord, 'down_up', { humanize: false })

      expect(result).toHaveLength(10)
      expect(result.map((n) => n.pitch)).toEqual([48, 52, 55, 60, 64, 64, 60, 55, 52, 48])
      expect(result.every((n) => n.duration === 1)).toBe(true)

      expect(result[0].start).toBe(1)
      expect(result[4].start).toBeCloseTo(1.04, 10)
      expect(result[5].start).toBe(2)
      expect(result[9].start).toBeCloseTo(2.04, 10)
    })

    it('block: leaves onsets and order alone', () => {
      expect(applyStrumPattern(chord, 'block')).toEqual(chord)
    })

    it('does not mutate the input notes', () => {
      const copy = chord.map((n) => ({ ...n }))
      applyStrumPattern(chord, 'down_up', { random: createSeededRandom(3) })
      expect(chord).toEqual(copy)
    })

    it('keeps onsets non-decreasing in strum order for down and up', () => {
      for (const pattern of ['down', 'up'] as const) {
        for (let seed = 0; seed < 25; seed++) {
          const result = applyStrumPattern(chord, pattern, { random: createSeededRandom(seed) })
          for (let i = 1; i < result.length; i++) {
            expect(result[i].start).toBeGreaterThanOrEqual(result[i - 1].start)
          }
        }
      }
    })
  })

  describe('applyVelocityVariation', () => {
    it('keeps the velocity when the variation draw is zero', () => {
      const result = applyVelocityVariation(chord, 80, { random: middle })
      expect(result.map((n) => n.velocity)).toEqual([80, 80, 80, 80, 80])
    })

    it('varies by up to ±15% by default', () => {
      // 80 * 0.15 = 12
      expect(applyVelocityVariation(chord.slice(0, 1), 80, { random: () => 0 })[0].velocity).toBe(68)
      expect(applyVelocityVariation(chord.slice(0, 1), 80, { random: () => 1 })[0].velocity).toBe(92)
    })

    it('honours a custom variation', () => {
      // 100 * 0.3 * 1 = 30
      const [note] = applyVelocityVariation(chord.slice(0, 1), 100, { variation: 0.3, random: () => 1 })
      expect(note.velocity).toBe(127)
    })

    it('clamps to 40-127', () => {
      expect(applyVelocityVariation(chord.slice(0, 1), 20, { random: middle })[0].velocity).toBe(40)
      expect(applyVelocityVariation(chord.slice(0, 1), 127, { random: () => 1 })[0].velocity).toBe(127)
    })

    it('copies pitch and timing unchanged', () => {
      const [note] = applyVelocityVariation(chord.slice(0, 1), 90, { random: middle })
      expect(note).toEqual({ pitch: 60, start: 1, duration: 2, velocity: 90 })
    })

    it('stays within bounds for any seed', () => {
      for (let seed = 0; seed < 25; seed++) {
        const random = createSeededRandom(seed)
        for (const velocity of [1, 40, 80, 127]) {
          for (const note of applyVelocityVariation(chord, velocity, { variation: 1, random })) {
            expect(note.velocity).toBeGreaterThanOrEqual(40)
            expect(note.velocity).toBeLessThanOrEqual(127)
          }
        }
      }
    })
  })

  describe('humanizeChord', () => {
    it('strums and assigns velocity in one pass', () => {
      const result = humanizeChord(chord, 80, 'down', { humanize: false, random: middle })

      expect(result.map((n) => n.pitch)).toEqual([48, 52, 55, 60, 64])
      expect(result.every((n) => n.velocity === 80)).toBe(true)
      expect(result[2].start).toBeCloseTo(1.02, 10)
    })

    it('is reproducible with a seeded random source', () => {
      const a = humanizeChord(chord, 80, 'down_up', { random: createSeededRandom(99) })
      const b = humanizeChord(chord, 80, 'down_up', { random: createSeededRandom(99) })
      expect(a).toEqual(b)
    })
  })
})
