export type ChordQuality = 'major' | 'minor' | 'dominant7' | 'unknown'

export interface ChordLabel {
  /** Pitch class of the root (C=0 ... B=11); null for the no-chord label */
  rootPitchClass: number | null
  quality: ChordQuality
  /** Display symbol (e.g., "Am", "G7"), or "N" when there is no chord */
  name: string
}
