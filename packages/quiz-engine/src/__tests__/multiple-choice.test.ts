import { describe, expect, it } from 'vitest'
import { createSeededRandom } from '../random'
import { numericDistractors, synthesizeMultipleChoice, TEXT_DISTRACTORS } from '../synthesizers/multiple-choice'
import type { TextAnalyzer } from '../nlp/text-analyzer'
import { createFakeAnalyzer } from './helpers/fake-analyzer'
import { scriptedRandom } from './helpers/scripted-random'

const analyzer = createFakeAnalyzer()

describe('numericDistractors', () => {
  it('scales the answer and keeps the first three', () => {
    expect(numericDistractors('40')).toEqual(['20', '60', '80'])
    expect(numericDistractors('3')).toEqual(['1', '4', '6'])
  })

  it('truncates scaled decimals toward zero', () => {
    expect(numericDistractors('2.5')).toEqual(['1', '3', '5'])
  })

  it('drops variants equal to the answer and duplicates', () => {
    expect(numericDistractors('1')).toEqual(['0', '2'])
  })

  it('falls back to successive integers when every variant equals the answer', () => {
    expect(numericDistractors('0')).toEqual(['1', '2', '3'])
  })

  it('returns null when the answer has no digits', () => {
    expect(numericDistractors('two')).toBeNull()
  })

  it('returns null when the numeral overflows to Infinity', () => {
    expect(numericDistractors('9'.repeat(400))).toBeNull()
  })

  it('drops scaled variants that overflow', () => {
    const distractors = numericDistractors('9'.repeat(308))

    expect(distractors).toHaveLength(3)
    expect(distractors?.every((value) => Number.isFinite(Number(value)))).toBe(true)
  })
})

describe('synthesizeMultipleChoice', () => {
  it('blanks a numeric answer and shuffles scaled distractors', () => {
    const random = scriptedRandom([0, 0, 0])
    const question = synthesizeMultipleChoice('Revenue grew 40 percent in one year.', {
      analyzer,
      random,
    })

    expect(question).toEqual({
      type: 'multiple_choice',
      prompt: 'Revenue grew _____ percent in one year.',
      options: ['20', '60', '80', '40'],
      correctAnswer: '40',
      answerIndex: 3,
      explanation: 'Revenue grew 40 percent in one year.',
    })
    expect(random.remaining()).toBe(0)
  })

  it('uses fixed text distractors for proper nouns', () => {
    const question = synthesizeMultipleChoice('The award went to Example University last week.', {
      analyzer,
      random: scriptedRandom([0.99, 0.99, 0.99]),
    })

    expect(question).toEqual({
      type: 'multiple_choice',
      prompt: 'The award went to _____ University last week.',
      options: ['Example', ...TEXT_DISTRACTORS],
      correctAnswer: 'Example',
      answerIndex: 0,
      explanation: 'The award went to Example University last week.',
    })
  })

  it('uses text distractors for a numeral too large to scale', () => {
    const huge = '9'.repeat(400)
    const question = synthesizeMultipleChoice(`The total was ${huge} units.`, {
      analyzer,
      random: scriptedRandom([0.99, 0.99, 0.99]),
    })

    expect(question?.prompt).toBe('The total was _____ units.')
    expect(question?.options).toEqual([huge, ...TEXT_DISTRACTORS])
  })

  it('returns null without key terms and draws no randomness', () => {
    const random = scriptedRandom([])

    expect(synthesizeMultipleChoice('nothing to see here at all.', { analyzer, random })).toBeNull()
  })

  it('falls back to a templated prompt when the answer is not in the sentence', () => {
    const stub: TextAnalyzer = {
      ...analyzer,
      tag: () => [{ token: 'Example', tag: 'proper_noun' }],
    }

    const question = synthesizeMultipleChoice('Nothing here Matches it.', {
      analyzer: stub,
      random: scriptedRandom([0.99, 0.99, 0.99]),
    })

    expect(question?.prompt).toBe('According to the text, nothing here matches it.?')
  })

  it('uses the number template and text distractors for cardinal words', () => {
    const stub: TextAnalyzer = {
      ...analyzer,
      tag: () => [{ token: 'seven', tag: 'cardinal' }],
    }

    const question = synthesizeMultipleChoice('The crew counted boats.', {
      analyzer: stub,
      random: scriptedRandom([0.99, 0.99, 0.99]),
    })

    expect(question?.prompt).toBe(
      'According to the text, what is the number mentioned: The crew counted boats.?'
    )
    expect(question?.options).toEqual(['seven', ...TEXT_DISTRACTORS])
  })

  it('always yields 2-4 unique options containing the answer once', () => {
    const random = createSeededRandom(2024)

    for (const value of ['0', '1', '2', '3', '7', '10', '42', '99.5', '1000']) {
      const question = synthesizeMultipleChoice(`The value was ${value} units in total.`, {
        analyzer,
        random,
      })
      if (!question) throw new Error(`no question for ${value}`)

      expect(question.correctAnswer).toBe(value)
      expect(new Set(question.options).size).toBe(question.options.length)
      expect(question.options.filter((option) => option === value)).toHaveLength(1)
      expect(question.options.length).toBeGreaterThanOrEqual(2)
      expect(question.options.length).toBeLessThanOrEqual(4)
      expect(question.options[question.answerIndex]).toBe(value)

      const distractors = question.options.filter((option) => option !== value)
      for (const distractor of distractors) {
        expect(Number(distractor)).not.toBe(Number(value))
      }
    }
  })
})
