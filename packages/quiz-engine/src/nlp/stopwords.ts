import englishStopwords from './stopwords-en.json'

export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(englishStopwords)
