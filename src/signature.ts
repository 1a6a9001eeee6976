import crypto from 'crypto'

export const SIGNATURE_HEADER = 'X-Hub-Signature-256'

const SIGNATURE_PREFIX = 'sha256='

/**
 * HMAC-SHA256 of the exact payload text, keyed by the shared secret (both UTF-8).
 * Returns the header value, e.g. `sha256=<64 hex chars>`.
 */
export function signPayload(payloadJson: string, secret: string): string {
  const digest = crypto
    .createHmac('sha256', Buffer.from(secret, 'utf8'))
    .update(Buffer.from(payloadJson, 'utf8'))
    .digest('hex')
  return `${SIGNATURE_PREFIX}${digest}`
}
