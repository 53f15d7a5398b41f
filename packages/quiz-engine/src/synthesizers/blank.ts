export const BLANK_PLACEHOLDER = '_____'

/**
 * Replaces the first literal occurrence of `term` with the blank placeholder.
 * Returns null when the term does not occur in the sentence.
 */
export function blankFirstOccurrence(sentence: string, term: string): string | null {
  const index = sentence.indexOf(term)
  if (term.length === 0 || index === -1) {
    return null
  }
  return sentence.slice(0, index) + BLANK_PLACEHOLDER + sentence.slice(index + term.length)
}
