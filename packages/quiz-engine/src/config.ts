type QuizEnv = {
  defaultQuestionCount?: string
  seed?: string
}

function parseCount(value: string | undefined, fallback: number): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed < 1) {
    return fallback
  }
  return Math.floor(parsed)
}

export function parseSeed(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null
  }
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    return null
  }
  return parsed >>> 0
}

const quizEnv: QuizEnv = {
  defaultQuestionCount: process.env.QUIZ_DEFAULT_QUESTION_COUNT,
  seed: process.env.QUIZ_SEED,
}

export const DEFAULT_QUESTION_COUNT = 5
export const DEFAULT_MAX_SENTENCES = 15

export const quizConfig = {
  defaultQuestionCount: parseCount(quizEnv.defaultQuestionCount, DEFAULT_QUESTION_COUNT),
  seed: parseSeed(quizEnv.seed),
}
