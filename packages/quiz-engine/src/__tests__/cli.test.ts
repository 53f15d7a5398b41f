import { describe, expect, it } from 'vitest'
import { parseArgs, resolveRandom, runGenerate, runGrade, usage } from '../cli'
import { AnswerCountMismatchError, InvalidPayloadError } from '../errors'

const payload = {
  questions: [
    {
      type: 'fill_blank',
      prompt: '_____ is the capital of France.',
      correctAnswer: 'Paris',
      explanation: 'Paris is the capital of France.',
    },
  ],
  answers: ['paris'],
}

describe('parseArgs', () => {
  it('reads the command and options', () => {
    expect(
      parseArgs(['generate', '--count', '3', '--seed', '7', '--title', 'Quarterly update'])
    ).toEqual({
      help: false,
      command: 'generate',
      count: 3,
      seed: '7',
      title: 'Quarterly update',
    })
  })

  it('ignores counts that are not positive integers', () => {
    expect(parseArgs(['generate', '--count', 'abc']).count).toBeUndefined()
    expect(parseArgs(['generate', '--count', '0']).count).toBeUndefined()
    expect(parseArgs(['generate', '--count', '2.5']).count).toBeUndefined()
  })

  it('flags help', () => {
    expect(parseArgs(['--help'])).toEqual({ help: true })
  })

  it('keeps the first command', () => {
    expect(parseArgs(['grade', 'generate']).command).toBe('grade')
  })
})

describe('usage', () => {
  it('names both commands', () => {
    expect(usage().split('\n')[0]).toBe('Usage: quiz-engine <generate|grade> [options]')
  })
})

describe('resolveRandom', () => {
  it('uses numeric and text seeds reproducibly', () => {
    expect(resolveRandom('7').next()).toBe(resolveRandom('7').next())
    expect(resolveRandom('report').next()).toBe(resolveRandom('report').next())
  })
})

describe('runGenerate', () => {
  it('returns an empty quiz for empty text', () => {
    expect(runGenerate('', { help: false, seed: '1' })).toEqual({ questions: [], count: 0 })
  })
})

describe('runGrade', () => {
  it('grades a valid JSON payload', () => {
    const result = runGrade(JSON.stringify(payload))

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.score).toBe(100)
      expect(result.value.results[0].isCorrect).toBe(true)
    }
  })

  it('reports malformed JSON', () => {
    const result = runGrade('not json')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidPayloadError)
      expect(result.error.message.startsWith('Grade payload is not valid JSON:')).toBe(true)
    }
  })

  it('reports mismatched answer counts', () => {
    const result = runGrade(JSON.stringify({ ...payload, answers: [] }))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AnswerCountMismatchError)
    }
  })
})
