export * from './types'
export {
  generateQuestions,
  generateQuizFromArticle,
  composeSourceText,
  stripMarkup,
} from './question-generator'
export { gradeSubmission, isAnswerCorrect } from './grader'
export {
  extractKeySentences,
  scoreSentences,
  scoreSentence,
  countContentWords,
  SCORING_SIGNALS,
  MIN_SENTENCE_LENGTH,
  type ScoringSignal,
} from './sentence-scorer'
export { extractKeyTerms, findNumerals } from './key-terms'
export {
  BLANK_PLACEHOLDER,
  NEGATION_PAIRS,
  QUESTION_TYPES,
  SYNTHESIZERS,
  TEXT_DISTRACTORS,
  blankFirstOccurrence,
  buildTrueFalse,
  negateStatement,
  numericDistractors,
  synthesizeFillBlank,
  synthesizeMultipleChoice,
  synthesizeTrueFalse,
  type NegationPair,
  type Synthesizer,
} from './synthesizers'
export {
  createSeededRandom,
  defaultRandom,
  fromUniform,
  seedFromString,
  type RandomSource,
} from './random'
export { createCompromiseAnalyzer, defaultAnalyzer } from './nlp/compromise-analyzer'
export { ENGLISH_STOPWORDS } from './nlp/stopwords'
export type { PartOfSpeech, TaggedToken, TextAnalyzer } from './nlp/text-analyzer'
export { AnswerCountMismatchError, InvalidPayloadError } from './errors'
export {
  FillBlankQuestionSchema,
  GradePayloadSchema,
  MultipleChoiceQuestionSchema,
  QuestionSchema,
  SubmittedAnswerSchema,
  TrueFalseQuestionSchema,
  parseGradePayload,
  type GradePayload,
} from './schemas'
export { Err, Ok, type Result } from './utils/result'
export { logger, moduleLogger } from './logger'
export { quizConfig, DEFAULT_QUESTION_COUNT, DEFAULT_MAX_SENTENCES } from './config'
