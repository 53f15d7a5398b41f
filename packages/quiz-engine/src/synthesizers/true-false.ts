import type { SynthesisContext, TrueFalseQuestion } from '../types'

export type NegationPair = {
  word: string
  replacement: string
}

/**
 * Scanned in order; only the first pair present in a statement is applied.
 */
export const NEGATION_PAIRS: readonly NegationPair[] = [
  { word: 'is', replacement: 'is not' },
  { word: 'are', replacement: 'are not' },
  { word: 'was', replacement: 'was not' },
  { word: 'were', replacement: 'were not' },
  { word: 'has', replacement: 'does not have' },
  { word: 'have', replacement: 'do not have' },
  { word: 'increased', replacement: 'decreased' },
  { word: 'decreased', replacement: 'increased' },
  { word: 'improved', replacement: 'worsened' },
  { word: 'found', replacement: 'did not find' },
]

const NEGATION_RULES = NEGATION_PAIRS.map((pair) => ({
  pattern: new RegExp(`\\b${pair.word}\\b`, 'gi'),
  replacement: pair.replacement,
}))

/**
 * Rewrites every whole-word occurrence of the first matching table word.
 * A statement with no table word comes back unchanged.
 */
export function negateStatement(statement: string): string {
  for (const rule of NEGATION_RULES) {
    const negated = statement.replace(rule.pattern, rule.replacement)
    if (negated !== statement) {
      return negated
    }
  }
  return statement
}

export function buildTrueFalse(sentence: string, asFalse: boolean): TrueFalseQuestion {
  const statement = sentence.trim()

  if (!asFalse) {
    return {
      type: 'true_false',
      prompt: `True or False: ${statement}`,
      correctAnswer: true,
      explanation: statement,
    }
  }

  // TODO: skip the false branch when negateStatement finds no trigger word;
  // the prompt is then the true statement labelled false.
  return {
    type: 'true_false',
    prompt: `True or False: ${negateStatement(statement)}`,
    correctAnswer: false,
    explanation: `The correct statement is: ${statement}`,
  }
}

export function synthesizeTrueFalse(
  sentence: string,
  { random }: Pick<SynthesisContext, 'random'>
): TrueFalseQuestion {
  return buildTrueFalse(sentence, random.next() > 0.5)
}
