import { quizConfig } from './config'
import { moduleLogger } from './logger'
import { defaultAnalyzer } from './nlp/compromise-analyzer'
import { defaultRandom } from './random'
import { extractKeySentences } from './sentence-scorer'
import { QUESTION_TYPES, SYNTHESIZERS } from './synthesizers'
import type { Question, QuizEngineOptions, SourceArticle, SynthesisContext } from './types'

const log = moduleLogger('generator')

const SENTENCE_POOL_FACTOR = 3
const ATTEMPT_FACTOR = 2

function resolveContext(options: QuizEngineOptions): SynthesisContext {
  return {
    analyzer: options.analyzer ?? defaultAnalyzer,
    random: options.random ?? defaultRandom,
  }
}

export function generateQuestions(
  text: string,
  numQuestions: number = quizConfig.defaultQuestionCount,
  options: QuizEngineOptions = {}
): Question[] {
  if (!Number.isFinite(numQuestions) || numQuestions <= 0) {
    return []
  }

  const target = Math.floor(numQuestions)
  const context = resolveContext(options)
  const sentences = extractKeySentences(text, target * SENTENCE_POOL_FACTOR, context.analyzer)

  if (sentences.length === 0) {
    log.debug({ textLength: text.length }, 'No eligible sentences found')
    return []
  }

  const questions: Question[] = []

  for (const sentence of sentences.slice(0, target * ATTEMPT_FACTOR)) {
    if (questions.length >= target) {
      break
    }

    const type = context.random.choice(QUESTION_TYPES)
    const question = SYNTHESIZERS[type](sentence, context)

    if (question) {
      questions.push(question)
    } else {
      log.debug({ type, sentence }, 'Sentence skipped: no question could be built')
    }
  }

  log.debug(
    { requested: target, generated: questions.length, candidates: sentences.length },
    'Question generation finished'
  )

  return questions.slice(0, target)
}

/**
 * Strips markup tags that feed summaries and abstracts often carry.
 */
export function stripMarkup(text: string): string {
  return text.replace(/<[^>]+>/g, '')
}

export function composeSourceText(article: SourceArticle): string {
  const body = stripMarkup(article.text).trim()
  const title = article.title?.trim()
  return title ? `${title}. ${body}` : body
}

export function generateQuizFromArticle(
  article: SourceArticle,
  numQuestions: number = quizConfig.defaultQuestionCount,
  options: QuizEngineOptions = {}
): Question[] {
  return generateQuestions(composeSourceText(article), numQuestions, options)
}
