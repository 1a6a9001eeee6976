import { Command, Option } from 'commander'
import { DEFAULT_TIMEOUT_MS, validateSendConfig } from '../../config'
import { formatFailure } from '../../errors'
import { LOG_LEVELS, setLogLevel } from '../../logger'
import { DEFAULT_REF, DEFAULT_REPOSITORY, DEFAULT_SENDER, buildDeployNotification } from '../../payload'
import { sendWebhook, type HttpTransport, type Output } from '../../sender'

interface SendCommandOptions {
  ref?: string
  repository?: string
  sender?: string
  workflowRunId?: string
  timeout?: string
  logLevel?: string
}

export interface SendCommandDeps {
  output: Output
  transport?: HttpTransport
  setExitCode: (code: number) => void
}

export function sendCommand(program: Command, deps: SendCommandDeps): void {
  program
    .argument('<url>', 'Webhook URL to send to')
    .argument('<secret>', 'HMAC secret for signing')
    .argument('<hook_id>', 'Hook identifier (e.g. deploy-staging, deploy-production)')
    .argument('<sha>', 'Git SHA to deploy')
    .option('--ref <ref>', 'Git ref', DEFAULT_REF)
    .option('--repository <repo>', 'Repository name', DEFAULT_REPOSITORY)
    .option('--sender <sender>', 'Sender username', DEFAULT_SENDER)
    .option('--workflow-run-id <id>', 'Workflow run ID', '')
    .option('--timeout <ms>', 'Request timeout in milliseconds', String(DEFAULT_TIMEOUT_MS))
    .addOption(new Option('--log-level <level>', 'Diagnostic log level (stderr)').choices(LOG_LEVELS).default('warn'))
    .allowExcessArguments(false)
    .action(async (url: string, secret: string, hookId: string, sha: string, options: SendCommandOptions) => {
      const validation = validateSendConfig({
        url,
        secret,
        hookId,
        sha,
        ref: options.ref,
        repository: options.repository,
        sender: options.sender,
        workflowRunId: options.workflowRunId,
        timeoutMs: options.timeout,
        logLevel: options.logLevel,
      })
      if (!validation.success) {
        const lines = formatFailure({
          code: 'USAGE',
          message: 'Invalid arguments:',
          details: validation.errors.map((error) => `- ${error}`).join('\n'),
        })
        lines.forEach((line) => deps.output.error(line))
        deps.setExitCode(1)
        return
      }

      const { config } = validation
      setLogLevel(config.logLevel)

      const notification = buildDeployNotification(config)
      const outcome = await sendWebhook(config.url, notification, config.secret, {
        transport: deps.transport,
        timeoutMs: config.timeoutMs,
        output: deps.output,
      })

      if (outcome.type === 'transport_error') {
        formatFailure(outcome.failure).forEach((line) => deps.output.log(line))
        deps.setExitCode(1)
        return
      }

      deps.output.log('')
      deps.output.log(`HTTP Status: ${outcome.status}`)
      deps.output.log(`Response: ${outcome.body}`)

      if (outcome.status !== 200) {
        formatFailure({
          code: 'REJECTED',
          message: `Webhook failed with status ${outcome.status}`,
          status: outcome.status,
          details: outcome.body,
        }).forEach((line) => deps.output.log(line))
        deps.setExitCode(1)
        return
      }

      deps.output.log('✅ Webhook sent successfully')
      deps.setExitCode(0)
    })
}
