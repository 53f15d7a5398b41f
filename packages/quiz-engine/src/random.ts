export type RandomSource = {
  // Uniform float in [0, 1)
  next(): number
  choice<T>(items: readonly T[]): T
  shuffle<T>(items: readonly T[]): T[]
}

/**
 * Builds a RandomSource on top of any uniform [0, 1) generator.
 */
export function fromUniform(next: () => number): RandomSource {
  const nextInt = (maxExclusive: number) => {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
      throw new Error(`maxExclusive must be positive int, got ${maxExclusive}`)
    }
    return Math.min(Math.floor(next() * maxExclusive), maxExclusive - 1)
  }

  const choice = <T>(items: readonly T[]): T => {
    if (items.length === 0) {
      throw new Error('Cannot choose from an empty list')
    }
    return items[nextInt(items.length)]
  }

  const shuffle = <T>(items: readonly T[]): T[] => {
    const arr = [...items]
    for (let i = arr.length - 1; i > 0; i -= 1) {
      const j = nextInt(i + 1)
      ;[arr[i], arr[j]] = [arr[j], arr[i]]
    }
    return arr
  }

  return { next, choice, shuffle }
}

export const defaultRandom: RandomSource = fromUniform(Math.random)

// Deterministic source for reproducible quizzes.
// xorshift32: small and sufficient for non-crypto randomness.
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  if (state === 0) state = 0x6d2b79f5

  const nextUint32 = () => {
    state ^= state << 13
    state >>>= 0
    state ^= state >>> 17
    state >>>= 0
    state ^= state << 5
    state >>>= 0
    return state
  }

  return fromUniform(() => nextUint32() / 0x100000000)
}

export function seedFromString(input: string): number {
  // FNV-1a 32-bit
  let hash = 0x811c9dc5
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}
