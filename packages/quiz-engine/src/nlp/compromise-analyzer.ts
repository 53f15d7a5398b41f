import nlp from 'compromise'
import { z } from 'zod'
import { ENGLISH_STOPWORDS } from './stopwords'
import type { PartOfSpeech, TaggedToken, TextAnalyzer } from './text-analyzer'

const TermSchema = z.object({
  text: z.string(),
  tags: z.array(z.string()),
})

const SentenceSchema = z.object({
  text: z.string(),
  terms: z.array(TermSchema).default([]),
})

const DocumentSchema = z.array(SentenceSchema)

type ParsedSentence = z.infer<typeof SentenceSchema>
type ParsedTerm = z.infer<typeof TermSchema>

function readDocument(text: string): ParsedSentence[] {
  return DocumentSchema.parse(nlp(text).json())
}

function readTerms(text: string): ParsedTerm[] {
  return readDocument(text)
    .flatMap((sentence) => sentence.terms)
    .filter((term) => term.text.length > 0)
}

export function toPartOfSpeech(tags: readonly string[]): PartOfSpeech {
  if (tags.includes('ProperNoun')) {
    return tags.includes('Plural') ? 'plural_proper_noun' : 'proper_noun'
  }
  if (tags.includes('Cardinal')) {
    return 'cardinal'
  }
  return 'other'
}

export function createCompromiseAnalyzer(
  stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS
): TextAnalyzer {
  return {
    stopwords,

    splitSentences(text) {
      return readDocument(text)
        .map((sentence) => sentence.text.trim())
        .filter((sentence) => sentence.length > 0)
    },

    tokenize(text) {
      return readTerms(text).map((term) => term.text)
    },

    tag(text): TaggedToken[] {
      return readTerms(text).map((term) => ({
        token: term.text,
        tag: toPartOfSpeech(term.tags),
      }))
    },
  }
}

export const defaultAnalyzer: TextAnalyzer = createCompromiseAnalyzer()
