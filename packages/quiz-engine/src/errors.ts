import type { ZodIssue } from 'zod'

/**
 * Error thrown when a submission does not carry one answer per question
 * No partial report is produced
 */
export class AnswerCountMismatchError extends Error {
  constructor(
    public readonly questionCount: number,
    public readonly answerCount: number
  ) {
    super(`Answers count mismatch: expected ${questionCount}, received ${answerCount}`)
    this.name = 'AnswerCountMismatchError'
  }
}

/**
 * Error returned when an untrusted payload (CLI stdin) fails schema validation
 */
export class InvalidPayloadError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[]
  ) {
    super(message)
    this.name = 'InvalidPayloadError'
  }
}
