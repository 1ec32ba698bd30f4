export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  baseUrl: string
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // SendGrid Config
  sendgridBaseUrl: string
  sendgridApiKey: string
  sendgridRequestTimeoutMs: number
  // Retry Config
  createTimeoutMs: number
  updateTimeoutMs: number
  deleteTimeoutMs: number
  retryInitialDelayMs: number
  retryMaxDelayMs: number
  retryMultiplier: number
  retryJitterRatio: number
}
