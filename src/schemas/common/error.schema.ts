import { z } from 'zod'

// Body of every error answer, Fastify's own and the SendGrid failure mapping
export const ErrorSchema = z.object({
  statusCode: z.number(),
  code: z.string(),
  error: z.string(),
  message: z.string().min(1),
})

export type ErrorResponse = z.infer<typeof ErrorSchema>
