import { z } from 'zod'

// Deleting something that is already gone is still a success
export const DeleteOutcomeResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  outcome: z.enum(['deleted', 'already-absent']),
})

export type DeleteOutcomeResponse = z.infer<typeof DeleteOutcomeResponseSchema>
