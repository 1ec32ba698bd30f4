import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    sendgridCredentials: z.enum(['configured', 'missing']),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
