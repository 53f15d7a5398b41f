import { ENGLISH_STOPWORDS } from '../../nlp/stopwords'
import type { PartOfSpeech, TaggedToken, TextAnalyzer } from '../../nlp/text-analyzer'

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:[.'][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu

/**
 * Regex-based stand-in for the NLP adapter:
 * - sentences end at . ! or ? followed by whitespace
 * - tokens starting with a digit are cardinals
 * - capitalized tokens after the first are proper nouns
 */
export function createFakeAnalyzer(overrides: Record<string, PartOfSpeech> = {}): TextAnalyzer {
  const tokenize = (text: string) => text.match(TOKEN_PATTERN) ?? []
  const fixedTags = new Map(Object.entries(overrides))

  return {
    stopwords: ENGLISH_STOPWORDS,

    splitSentences(text) {
      return text
        .split(/(?<=[.!?])\s+/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0)
    },

    tokenize,

    tag(text) {
      return tokenize(text).map((token, index): TaggedToken => {
        const override = fixedTags.get(token)
        if (override) return { token, tag: override }
        if (/^\d/.test(token)) return { token, tag: 'cardinal' }
        if (index > 0 && /^[A-Z][a-z]/.test(token)) return { token, tag: 'proper_noun' }
        return { token, tag: 'other' }
      })
    },
  }
}
