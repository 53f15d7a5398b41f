/**
 * Part-of-speech categories the quiz engine distinguishes.
 * Everything else collapses into 'other'.
 */
export type PartOfSpeech = 'proper_noun' | 'plural_proper_noun' | 'cardinal' | 'other'

export type TaggedToken = {
  token: string
  tag: PartOfSpeech
}

/**
 * Segmentation, tokenization and tagging capability consumed by the engine.
 * Implementations must be deterministic for identical input.
 */
export interface TextAnalyzer {
  readonly stopwords: ReadonlySet<string>
  splitSentences(text: string): string[]
  tokenize(text: string): string[]
  tag(text: string): TaggedToken[]
}

export function isProperNounTag(tag: PartOfSpeech): boolean {
  return tag === 'proper_noun' || tag === 'plural_proper_noun'
}
