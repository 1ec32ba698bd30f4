import { z } from 'zod'

export const SubuserDesiredSchema = z.object({
  username: z
    .string()
    .min(1, { error: 'Username is required' })
    .max(64, { error: 'Username must be at most 64 characters' }),
  email: z.email({ error: 'A valid email is required' }),
  password: z.string().min(1, { error: 'Password is required' }),
  ips: z.array(z.string().min(1)).meta({
    description: 'IP addresses assigned to the subuser',
  }),
  disabled: z.boolean().optional().meta({
    description: 'Left out, the value reported by SendGrid is kept',
  }),
})

export const SubuserStateSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
  ips: z.array(z.string()),
  disabled: z.boolean(),
  userId: z.number().int(),
  signupSessionToken: z.string().optional(),
  authorizationToken: z.string().optional(),
  creditAllocationType: z.string().optional(),
})

export const SubuserParamsSchema = z.object({
  username: z.string().min(1),
})

export const UpdateSubuserBodySchema = z.object({
  prior: SubuserStateSchema,
  desired: SubuserDesiredSchema,
})

export const ImportSubuserBodySchema = z.object({
  username: z.string().min(1, { error: 'Username is required' }),
})

export const SubuserResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  subuser: SubuserStateSchema,
})

export type SubuserDesiredBody = z.infer<typeof SubuserDesiredSchema>
export type SubuserStateBody = z.infer<typeof SubuserStateSchema>
export type SubuserParams = z.infer<typeof SubuserParamsSchema>
export type UpdateSubuserBody = z.infer<typeof UpdateSubuserBodySchema>
export type ImportSubuserBody = z.infer<typeof ImportSubuserBodySchema>
export type SubuserResponse = z.infer<typeof SubuserResponseSchema>
