import { DEFAULT_MAX_SENTENCES } from './config'
import { defaultAnalyzer } from './nlp/compromise-analyzer'
import type { TextAnalyzer } from './nlp/text-analyzer'
import type { ScoredSentence } from './types'

export const MIN_SENTENCE_LENGTH = 20
const CONTENT_WORD_THRESHOLD = 5

export type ScoringSignal = {
  name: string
  points: number
  matches(sentence: string, analyzer: TextAnalyzer): boolean
}

function patternSignal(name: string, points: number, pattern: RegExp): ScoringSignal {
  return {
    name,
    points,
    matches: (sentence) => pattern.test(sentence),
  }
}

export function countContentWords(sentence: string, analyzer: TextAnalyzer): number {
  return analyzer
    .tokenize(sentence.toLowerCase())
    .filter((word) => /^[\p{L}\p{N}]+$/u.test(word) && !analyzer.stopwords.has(word)).length
}

/**
 * Quiz-worthiness signals, each counted at most once per sentence.
 */
export const SCORING_SIGNALS: readonly ScoringSignal[] = [
  patternSignal('numeral', 3, /\d/),
  patternSignal('quantity', 2, /\b(?:percent|million|billion|thousand|hundred)\b/i),
  patternSignal(
    'month',
    2,
    /\b(?:January|February|March|April|May|June|July|August|September|October|November|December)\b/i
  ),
  patternSignal(
    'research_phrase',
    2,
    /\b(?:according to|study shows|research indicates|findings suggest)\b/i
  ),
  patternSignal('capitalized_pair', 1, /[A-Z][a-z]+ [A-Z][a-z]+/i),
  patternSignal('change_verb', 1, /\b(?:increased|decreased|improved|reduced|discovered|found)\b/i),
  {
    name: 'content_rich',
    points: 1,
    matches: (sentence, analyzer) =>
      countContentWords(sentence, analyzer) > CONTENT_WORD_THRESHOLD,
  },
]

export function scoreSentence(sentence: string, analyzer: TextAnalyzer = defaultAnalyzer): number {
  return SCORING_SIGNALS.reduce(
    (score, signal) => (signal.matches(sentence, analyzer) ? score + signal.points : score),
    0
  )
}

/**
 * Scores every eligible sentence, best first. Ties keep their original order.
 */
export function scoreSentences(
  text: string,
  analyzer: TextAnalyzer = defaultAnalyzer
): ScoredSentence[] {
  const scored = analyzer
    .splitSentences(text)
    .filter((sentence) => [...sentence].length >= MIN_SENTENCE_LENGTH)
    .map((sentence) => ({ text: sentence, score: scoreSentence(sentence, analyzer) }))

  // Array.prototype.sort is stable
  return scored.sort((a, b) => b.score - a.score)
}

export function extractKeySentences(
  text: string,
  maxSentences: number = DEFAULT_MAX_SENTENCES,
  analyzer: TextAnalyzer = defaultAnalyzer
): string[] {
  if (maxSentences <= 0) {
    return []
  }
  return scoreSentences(text, analyzer)
    .slice(0, maxSentences)
    .map((sentence) => sentence.text)
}
