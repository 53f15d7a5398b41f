import { quizConfig, parseSeed } from './config'
import { AnswerCountMismatchError, InvalidPayloadError } from './errors'
import { gradeSubmission } from './grader'
import { generateQuizFromArticle } from './question-generator'
import { createSeededRandom, defaultRandom, type RandomSource, seedFromString } from './random'
import { parseGradePayload } from './schemas'
import type { GradeReport, Question } from './types'
import { Err, Ok, type Result } from './utils/result'

export type CliCommand = 'generate' | 'grade'

export type CliOptions = {
  command?: CliCommand
  count?: number
  seed?: string
  title?: string
  help: boolean
}

export type GenerateOutput = {
  questions: Question[]
  count: number
}

export function usage(): string {
  return [
    'Usage: quiz-engine <generate|grade> [options]',
    '',
    'Commands:',
    '  generate   Read a passage from STDIN and print quiz questions as JSON',
    '  grade      Read {"questions": [...], "answers": [...]} from STDIN and print the report',
    '',
    'Options (generate):',
    '  --count <n>     Number of questions (default QUIZ_DEFAULT_QUESTION_COUNT or 5)',
    '  --seed <value>  Seed for reproducible output (default QUIZ_SEED)',
    '  --title <text>  Title prepended to the passage',
    '',
    'Environment:',
    '  LOG_LEVEL      debug | info | warn | error',
  ].join('\n')
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false }

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i]
    if ((current === 'generate' || current === 'grade') && !opts.command) {
      opts.command = current
    } else if (current === '--count' && i + 1 < argv.length) {
      const parsed = Number(argv[i + 1])
      if (Number.isInteger(parsed) && parsed > 0) {
        opts.count = parsed
      }
      i += 1
    } else if (current === '--seed' && i + 1 < argv.length) {
      opts.seed = argv[i + 1]
      i += 1
    } else if (current === '--title' && i + 1 < argv.length) {
      opts.title = argv[i + 1]
      i += 1
    } else if (current === '--help') {
      opts.help = true
    }
  }

  return opts
}

/**
 * Integer seeds are used as-is, anything else is hashed.
 */
export function resolveRandom(seed: string | undefined): RandomSource {
  if (seed === undefined) {
    return quizConfig.seed === null ? defaultRandom : createSeededRandom(quizConfig.seed)
  }
  return createSeededRandom(parseSeed(seed) ?? seedFromString(seed))
}

export function runGenerate(text: string, opts: CliOptions): GenerateOutput {
  const questions = generateQuizFromArticle(
    { title: opts.title ?? null, text },
    opts.count ?? quizConfig.defaultQuestionCount,
    { random: resolveRandom(opts.seed) }
  )
  return { questions, count: questions.length }
}

export function runGrade(
  input: string
): Result<GradeReport, InvalidPayloadError | AnswerCountMismatchError> {
  let raw: unknown
  try {
    raw = JSON.parse(input)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return Err(new InvalidPayloadError(`Grade payload is not valid JSON: ${reason}`, []))
  }

  const payload = parseGradePayload(raw)
  if (!payload.ok) {
    return payload
  }

  try {
    return Ok(gradeSubmission(payload.value.questions, payload.value.answers))
  } catch (error) {
    if (error instanceof AnswerCountMismatchError) {
      return Err(error)
    }
    throw error
  }
}
