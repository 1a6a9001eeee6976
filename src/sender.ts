import { DEFAULT_TIMEOUT_MS } from './config/schema'
import { toTransportFailure, type TransportFailure } from './errors'
import { logger } from './logger'
import { renderPayload, serializePayload } from './payload'
import { SIGNATURE_HEADER, signPayload } from './signature'
import type { DeployNotification } from './types'

export interface HttpRequest {
  url: string
  headers: Record<string, string>
  body: string
  timeoutMs: number
}

export interface HttpResponse {
  status: number
  body: string
}

/**
 * Sends one POST and resolves with whatever the receiver answered.
 * Rejects only when no response could be obtained.
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>

export interface Output {
  log(message: string): void
  error(message: string): void
}

export type SendOutcome =
  | { type: 'response'; status: number; body: string }
  | { type: 'transport_error'; failure: TransportFailure }

export interface SendOptions {
  transport?: HttpTransport
  timeoutMs?: number
  output?: Output
}

export const fetchTransport: HttpTransport = async (request) => {
  const response = await fetch(request.url, {
    method: 'POST',
    headers: request.headers,
    body: request.body,
    redirect: 'manual',
    signal: AbortSignal.timeout(request.timeoutMs),
  })
  return { status: response.status, body: await response.text() }
}

export async function sendWebhook(
  url: string,
  notification: DeployNotification,
  secret: string,
  options: SendOptions = {}
): Promise<SendOutcome> {
  const transport = options.transport ?? fetchTransport
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const output = options.output ?? console

  const payloadJson = serializePayload(notification)
  const signature = signPayload(payloadJson, secret)

  output.log(`Webhook URL: ${url}`)
  output.log(`Signature: ${signature}`)
  output.log(`Payload:\n${renderPayload(notification)}`)

  logger.debug({ url, timeoutMs, bytes: Buffer.byteLength(payloadJson) }, '[sender] Posting webhook')

  try {
    const response = await transport({
      url,
      headers: {
        'Content-Type': 'application/json',
        [SIGNATURE_HEADER]: signature,
      },
      body: payloadJson,
      timeoutMs,
    })
    logger.debug({ status: response.status }, '[sender] Received response')
    return { type: 'response', status: response.status, body: response.body }
  } catch (error) {
    const failure = toTransportFailure(error)
    logger.warn({ code: failure.code, error: failure.message }, '[sender] Transport failure')
    return { type: 'transport_error', failure }
  }
}
