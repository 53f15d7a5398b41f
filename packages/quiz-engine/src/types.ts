import type { TextAnalyzer } from './nlp/text-analyzer'
import type { RandomSource } from './random'

export type SourceArticle = {
  title?: string | null
  text: string
}

export type ScoredSentence = {
  text: string
  score: number
}

export type KeyTermKind = 'number' | 'proper_noun'

export type KeyTerm = {
  value: string
  kind: KeyTermKind
}

export type QuestionType = 'multiple_choice' | 'true_false' | 'fill_blank'

export type MultipleChoiceQuestion = {
  type: 'multiple_choice'
  prompt: string
  options: string[]
  correctAnswer: string
  // Position of correctAnswer within options after shuffling
  answerIndex: number
  explanation: string
}

export type TrueFalseQuestion = {
  type: 'true_false'
  prompt: string
  correctAnswer: boolean
  explanation: string
}

export type FillBlankQuestion = {
  type: 'fill_blank'
  prompt: string
  correctAnswer: string
  explanation: string
}

export type Question = MultipleChoiceQuestion | TrueFalseQuestion | FillBlankQuestion

export type SubmittedAnswer = string | number | boolean

export type AnswerResult = {
  index: number
  prompt: string
  submittedAnswer: SubmittedAnswer
  correctAnswer: string | boolean
  isCorrect: boolean
  explanation: string
}

export type GradeReport = {
  score: number // 0..100, two decimals
  correctCount: number
  total: number
  results: AnswerResult[]
}

export type QuizEngineOptions = {
  analyzer?: TextAnalyzer
  random?: RandomSource
}

/**
 * Capabilities every synthesizer receives
 */
export type SynthesisContext = {
  analyzer: TextAnalyzer
  random: RandomSource
}
