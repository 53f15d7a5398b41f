import { z } from 'zod'
import { InvalidPayloadError } from './errors'
import { Err, Ok, type Result } from './utils/result'
import type { Question, SubmittedAnswer } from './types'

export const MultipleChoiceQuestionSchema = z
  .object({
    type: z.literal('multiple_choice'),
    prompt: z.string(),
    options: z.array(z.string()).min(2).max(4),
    correctAnswer: z.string(),
    answerIndex: z.number().int().nonnegative(),
    explanation: z.string(),
  })
  .refine((question) => question.options[question.answerIndex] === question.correctAnswer, {
    message: 'answerIndex must point at correctAnswer',
    path: ['answerIndex'],
  })

export const TrueFalseQuestionSchema = z.object({
  type: z.literal('true_false'),
  prompt: z.string(),
  correctAnswer: z.boolean(),
  explanation: z.string(),
})

export const FillBlankQuestionSchema = z.object({
  type: z.literal('fill_blank'),
  prompt: z.string(),
  correctAnswer: z.string(),
  explanation: z.string(),
})

export const QuestionSchema: z.ZodType<Question> = z.union([
  MultipleChoiceQuestionSchema,
  TrueFalseQuestionSchema,
  FillBlankQuestionSchema,
])

export const SubmittedAnswerSchema: z.ZodType<SubmittedAnswer> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
])

export const GradePayloadSchema = z.object({
  questions: z.array(QuestionSchema),
  answers: z.array(SubmittedAnswerSchema),
})

export type GradePayload = z.infer<typeof GradePayloadSchema>

export function parseGradePayload(raw: unknown): Result<GradePayload, InvalidPayloadError> {
  const parsed = GradePayloadSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(new InvalidPayloadError('Invalid grade payload', parsed.error.issues))
  }
  return Ok(parsed.data)
}
