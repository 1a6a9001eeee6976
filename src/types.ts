import { z } from 'zod'

/**
 * Deployment trigger sent to the webhook receiver.
 * Key order is part of the wire format: the signature covers the serialized text.
 */
export const DeployNotificationSchema = z.object({
  hook_id: z.string(),
  sha: z.string(),
  ref: z.string(),
  repository: z.string(),
  sender: z.string(),
  triggered_by: z.literal('github-actions'),
  workflow_run_id: z.string(),
}).strict()

export type DeployNotification = Readonly<z.infer<typeof DeployNotificationSchema>>

export const DEPLOY_NOTIFICATION_KEYS = [
  'hook_id',
  'sha',
  'ref',
  'repository',
  'sender',
  'triggered_by',
  'workflow_run_id',
] as const satisfies ReadonlyArray<keyof DeployNotification>
