import type { Question, QuestionType, SynthesisContext } from '../types'
import { synthesizeFillBlank } from './fill-blank'
import { synthesizeMultipleChoice } from './multiple-choice'
import { synthesizeTrueFalse } from './true-false'

export type Synthesizer = (sentence: string, context: SynthesisContext) => Question | null

export const QUESTION_TYPES: readonly QuestionType[] = ['multiple_choice', 'true_false', 'fill_blank']

export const SYNTHESIZERS: Record<QuestionType, Synthesizer> = {
  multiple_choice: synthesizeMultipleChoice,
  true_false: synthesizeTrueFalse,
  fill_blank: synthesizeFillBlank,
}

export { BLANK_PLACEHOLDER, blankFirstOccurrence } from './blank'
export { synthesizeFillBlank } from './fill-blank'
export { numericDistractors, synthesizeMultipleChoice, TEXT_DISTRACTORS } from './multiple-choice'
export { buildTrueFalse, NEGATION_PAIRS, negateStatement, synthesizeTrueFalse } from './true-false'
export type { NegationPair } from './true-false'
