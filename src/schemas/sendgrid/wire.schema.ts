import { z } from 'zod'

// SendGrid answers with more fields than listed here; unknown keys are stripped.

// Subuser as returned by POST /subusers (user_id) and GET /subusers (id)
export const SubuserWireSchema = z
  .object({
    id: z.number().int().optional(),
    user_id: z.number().int().optional(),
    username: z.string().min(1),
    email: z.string(),
    disabled: z.boolean().optional(),
    ips: z.array(z.string()).optional(),
    signup_session_token: z.string().optional(),
    authorization_token: z.string().optional(),
    credit_allocation: z
      .object({
        type: z.string().optional(),
      })
      .optional(),
  })
  .refine(
    (wire) => wire.id !== undefined || wire.user_id !== undefined,
    'subuser id is missing',
  )

export const SubuserListWireSchema = z.array(SubuserWireSchema)

export const ApiKeyWireSchema = z.object({
  api_key_id: z.string().min(1),
  api_key: z.string().optional(),
  name: z.string(),
  scopes: z.array(z.string()).optional(),
})

export type DecodedSubuserWire = z.infer<typeof SubuserWireSchema>
export type DecodedApiKeyWire = z.infer<typeof ApiKeyWireSchema>
