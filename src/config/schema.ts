import { z } from 'zod'
import { LOG_LEVELS } from '../logger'
import { DEFAULT_REF, DEFAULT_REPOSITORY, DEFAULT_SENDER } from '../payload'

export const DEFAULT_TIMEOUT_MS = 30_000
// Largest delay a Node timer accepts without clamping.
export const MAX_TIMEOUT_MS = 2_147_483_647

function usesHttpScheme(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'https:' || protocol === 'http:'
  } catch {
    // unparsable URLs are reported by .url()
    return true
  }
}

export const WebhookUrlSchema = z
  .string()
  .url()
  .refine(usesHttpScheme, 'URL must use http or https')

export const SendConfigSchema = z.object({
  url: WebhookUrlSchema,
  // An empty secret still signs deterministically.
  secret: z.string(),
  hookId: z.string(),
  sha: z.string(),
  ref: z.string().default(DEFAULT_REF),
  repository: z.string().default(DEFAULT_REPOSITORY),
  sender: z.string().default(DEFAULT_SENDER),
  workflowRunId: z.string().default(''),
  timeoutMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TIMEOUT_MS),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
})

export type SendConfig = z.infer<typeof SendConfigSchema>
export type SendConfigInput = z.input<typeof SendConfigSchema>
