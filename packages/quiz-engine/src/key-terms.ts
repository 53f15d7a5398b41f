import { defaultAnalyzer } from './nlp/compromise-analyzer'
import { isProperNounTag, type TextAnalyzer } from './nlp/text-analyzer'
import type { KeyTerm } from './types'

export const NUMERAL_PATTERN = /\d+(?:\.\d+)?/g

const MIN_PROPER_NOUN_LENGTH = 3

export function findNumerals(sentence: string): string[] {
  return Array.from(sentence.matchAll(NUMERAL_PATTERN), (match) => match[0])
}

/**
 * Candidate answers for a sentence: numerals in text order, then tagged
 * proper nouns and cardinals in tagging order.
 */
export function extractKeyTerms(
  sentence: string,
  analyzer: TextAnalyzer = defaultAnalyzer
): KeyTerm[] {
  const terms = findNumerals(sentence).map((value): KeyTerm => ({ value, kind: 'number' }))

  for (const { token, tag } of analyzer.tag(sentence)) {
    if (isProperNounTag(tag) && token.length >= MIN_PROPER_NOUN_LENGTH) {
      terms.push({ value: token, kind: 'proper_noun' })
    } else if (tag === 'cardinal' && !terms.some((term) => term.value === token)) {
      terms.push({ value: token, kind: 'number' })
    }
  }

  return terms
}
