import { SendConfigSchema, type SendConfig } from './schema'

// Names the operator typed, so usage errors point at the argument or flag.
const CLI_NAMES: Record<string, string> = {
  url: 'url',
  secret: 'secret',
  hookId: 'hook_id',
  sha: 'sha',
  ref: '--ref',
  repository: '--repository',
  sender: '--sender',
  workflowRunId: '--workflow-run-id',
  timeoutMs: '--timeout',
  logLevel: '--log-level',
}

export type ConfigValidationResult =
  | { success: true; config: SendConfig }
  | { success: false; errors: string[] }

export function validateSendConfig(raw: Record<string, unknown>): ConfigValidationResult {
  const parsed = SendConfigSchema.safeParse(raw)
  if (parsed.success) {
    return { success: true, config: parsed.data }
  }

  const errors = parsed.error.issues.map((issue) => {
    const key = issue.path.join('.')
    const field = key ? (CLI_NAMES[key] ?? key) : 'arguments'
    return `${field}: ${issue.message}`
  })
  return { success: false, errors }
}

export { SendConfigSchema, DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS, type SendConfig, type SendConfigInput } from './schema'
