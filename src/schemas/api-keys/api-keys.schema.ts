import { z } from 'zod'

export const ApiKeyDesiredSchema = z.object({
  name: z
    .string()
    .min(1, { error: 'Name is required' })
    .max(100, { error: 'Name must be less than 100 characters' }),
  scopes: z.array(z.string().min(1)).optional().meta({
    description: 'Permission scopes; left out or empty, scopes are unchanged',
  }),
})

export const ApiKeyStateSchema = z.object({
  id: z.string(),
  name: z.string(),
  scopes: z.array(z.string()),
  apiKey: z.string().optional().meta({
    description: 'Secret, only ever returned by the create call',
  }),
})

export const ApiKeyParamsSchema = z.object({
  id: z.string().min(1),
})

export const UpdateApiKeyBodySchema = z.object({
  prior: ApiKeyStateSchema,
  desired: ApiKeyDesiredSchema,
})

export const ImportApiKeyBodySchema = z.object({
  id: z.string().min(1, { error: 'API key id is required' }),
})

export const ApiKeyResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  apiKey: ApiKeyStateSchema,
})

export type ApiKeyDesiredBody = z.infer<typeof ApiKeyDesiredSchema>
export type ApiKeyParams = z.infer<typeof ApiKeyParamsSchema>
export type UpdateApiKeyBody = z.infer<typeof UpdateApiKeyBodySchema>
export type ImportApiKeyBody = z.infer<typeof ImportApiKeyBodySchema>
export type ApiKeyResponse = z.infer<typeof ApiKeyResponseSchema>
