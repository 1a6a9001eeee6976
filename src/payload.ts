import { DeployNotificationSchema, type DeployNotification } from './types'

export const DEFAULT_REF = 'refs/heads/main'
export const DEFAULT_REPOSITORY = 'org/repo'
export const DEFAULT_SENDER = 'github-actions'
export const TRIGGERED_BY = 'github-actions'

export interface DeployNotificationInput {
  hookId: string
  sha: string
  ref?: string
  repository?: string
  sender?: string
  workflowRunId?: string
}

export function buildDeployNotification(input: DeployNotificationInput): DeployNotification {
  const notification = DeployNotificationSchema.parse({
    hook_id: input.hookId,
    sha: input.sha,
    ref: input.ref ?? DEFAULT_REF,
    repository: input.repository ?? DEFAULT_REPOSITORY,
    sender: input.sender ?? DEFAULT_SENDER,
    triggered_by: TRIGGERED_BY,
    workflow_run_id: input.workflowRunId ?? '',
  })
  return Object.freeze(notification)
}

/**
 * Compact JSON, exactly as transmitted and signed.
 */
export function serializePayload(notification: DeployNotification): string {
  return JSON.stringify(orderedFields(notification))
}

export function renderPayload(notification: DeployNotification): string {
  return JSON.stringify(orderedFields(notification), null, 2)
}

// Keys in wire order, whatever order the record was built in.
function orderedFields(notification: DeployNotification): DeployNotification {
  return {
    hook_id: notification.hook_id,
    sha: notification.sha,
    ref: notification.ref,
    repository: notification.repository,
    sender: notification.sender,
    triggered_by: notification.triggered_by,
    workflow_run_id: notification.workflow_run_id,
  }
}
