/**
 * SendGrid v3 entity and wire types.
 *
 * Wire types mirror the JSON the API speaks (snake_case, every field
 * optional because writes omit what they do not change). Entity types are
 * what the rest of the code works with once a response has been decoded.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

//
// ============================================================
// SUBUSERS
// ============================================================
//

export interface SubuserWire {
  id?: number
  user_id?: number
  username?: string
  email?: string
  password?: string
  ips?: string[]
  disabled?: boolean
  signup_session_token?: string
  authorization_token?: string
  credit_allocation?: {
    type?: string
  }
}

export interface Subuser {
  /** Remote numeric id, assigned on creation */
  userId: number
  username: string
  email: string
  disabled: boolean
  /** Only present when the endpoint that produced it returns them */
  ips?: string[]
  signupSessionToken?: string
  authorizationToken?: string
  creditAllocationType?: string
}

/** Fields accepted by subuser creation */
export interface SubuserCreateInput {
  username: string
  email: string
  password: string
  ips: string[]
}

/**
 * Scoped subuser changes. `undefined` and empty arrays mean "leave as is".
 */
export interface SubuserChanges {
  disabled?: boolean
  ips?: string[]
}

//
// ============================================================
// API KEYS
// ============================================================
//

export interface ApiKeyWire {
  api_key_id?: string
  api_key?: string
  name?: string
  scopes?: string[]
}

export interface ApiKey {
  id: string
  name: string
  scopes: string[]
  /** The secret; SendGrid only returns it from create */
  apiKey?: string
}

export interface ApiKeyCreateInput {
  name: string
  scopes?: string[]
}

export interface ApiKeyChanges {
  name?: string
  scopes?: string[]
}
