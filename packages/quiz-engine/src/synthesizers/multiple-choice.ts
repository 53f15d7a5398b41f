import { extractKeyTerms } from '../key-terms'
import type { KeyTerm, MultipleChoiceQuestion, SynthesisContext } from '../types'
import { blankFirstOccurrence } from './blank'

export const TEXT_DISTRACTORS = [
  'Not mentioned in the text',
  'All of the above',
  'None of the above',
] as const

const SCALE_FACTORS = [0.5, 1.5, 2, 0.8] as const
const FALLBACK_OFFSETS = [1, 2, 3] as const
const MAX_DISTRACTORS = 3

/**
 * Scaled integer variants of the answer's first numeral, none numerically
 * equal to it. Returns null when the answer has no digits or its numeral
 * overflows to Infinity.
 */
export function numericDistractors(answer: string): string[] | null {
  const numeral = /\d+(?:\.\d+)?/.exec(answer)
  if (!numeral) {
    return null
  }

  const base = Number(numeral[0])
  if (!Number.isFinite(base)) {
    return null
  }

  let values = SCALE_FACTORS.map((factor) => Math.trunc(base * factor)).filter(
    (value) => value !== base && Number.isFinite(value)
  )

  // Every scaled variant collapses onto the answer for zero
  if (values.length === 0) {
    values = FALLBACK_OFFSETS.map((offset) => Math.trunc(base) + offset)
  }

  return Array.from(new Set(values))
    .slice(0, MAX_DISTRACTORS)
    .map((value) => String(value))
}

function buildDistractors(answer: KeyTerm): string[] {
  const numeric = answer.kind === 'number' ? numericDistractors(answer.value) : null
  const distractors = numeric ?? [...TEXT_DISTRACTORS]
  return distractors.filter((option) => option !== answer.value)
}

function buildPrompt(sentence: string, answer: KeyTerm): string {
  const blanked = blankFirstOccurrence(sentence, answer.value)
  if (blanked !== null) {
    return blanked
  }
  if (answer.kind === 'number') {
    return `According to the text, what is the number mentioned: ${sentence}?`
  }
  return `According to the text, ${sentence.toLowerCase()}?`
}

export function synthesizeMultipleChoice(
  sentence: string,
  { analyzer, random }: SynthesisContext
): MultipleChoiceQuestion | null {
  const [answer] = extractKeyTerms(sentence, analyzer)
  if (!answer) {
    return null
  }

  const options = random.shuffle([answer.value, ...buildDistractors(answer)])

  return {
    type: 'multiple_choice',
    prompt: buildPrompt(sentence, answer),
    options,
    correctAnswer: answer.value,
    answerIndex: options.indexOf(answer.value),
    explanation: sentence,
  }
}
