import { AnswerCountMismatchError } from './errors'
import type { AnswerResult, GradeReport, Question, SubmittedAnswer } from './types'

function normalizeAnswer(value: SubmittedAnswer): string {
  return String(value).toLowerCase()
}

function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100
}

export function isAnswerCorrect(question: Question, answer: SubmittedAnswer): boolean {
  return normalizeAnswer(answer) === normalizeAnswer(question.correctAnswer)
}

/**
 * Grades one answer per question, in order.
 *
 * @throws AnswerCountMismatchError when the lengths differ
 */
export function gradeSubmission(
  questions: readonly Question[],
  answers: readonly SubmittedAnswer[]
): GradeReport {
  if (answers.length !== questions.length) {
    throw new AnswerCountMismatchError(questions.length, answers.length)
  }

  const results: AnswerResult[] = questions.map((question, index) => {
    const submittedAnswer = answers[index]
    return {
      index,
      prompt: question.prompt,
      submittedAnswer,
      correctAnswer: question.correctAnswer,
      isCorrect: isAnswerCorrect(question, submittedAnswer),
      explanation: question.explanation,
    }
  })

  const correctCount = results.filter((result) => result.isCorrect).length
  const total = questions.length
  const score = total === 0 ? 0 : roundToHundredths((correctCount / total) * 100)

  return { score, correctCount, total, results }
}
