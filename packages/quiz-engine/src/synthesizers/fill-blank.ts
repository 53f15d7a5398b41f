import { extractKeyTerms } from '../key-terms'
import type { FillBlankQuestion, SynthesisContext } from '../types'
import { blankFirstOccurrence } from './blank'

export function synthesizeFillBlank(
  sentence: string,
  { analyzer }: Pick<SynthesisContext, 'analyzer'>
): FillBlankQuestion | null {
  const [answer] = extractKeyTerms(sentence, analyzer)
  if (!answer) {
    return null
  }

  const prompt = blankFirstOccurrence(sentence, answer.value)
  if (prompt === null) {
    return null
  }

  return {
    type: 'fill_blank',
    prompt,
    correctAnswer: answer.value,
    explanation: sentence,
  }
}
