export type DeliveryErrorCode =
  | 'USAGE'
  | 'TRANSPORT'
  | 'TRANSPORT_TIMEOUT'
  | 'REJECTED'

export type DeliveryFailure = {
  code: DeliveryErrorCode
  message: string
  status?: number
  details?: string
}

export type TransportFailure = DeliveryFailure & {
  code: 'TRANSPORT' | 'TRANSPORT_TIMEOUT'
}

export function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  )
}

/**
 * Flattens an error and its `cause` chain into one line, e.g.
 * `fetch failed: connect ECONNREFUSED 127.0.0.1:9`.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error)

  const parts: string[] = []
  let current: unknown = error
  while (current instanceof Error) {
    if (current instanceof AggregateError && !current.message) {
      parts.push(current.errors.map((inner: unknown) => describeError(inner)).join('; '))
    } else if (current.message) {
      parts.push(current.message)
    }
    current = current.cause
  }
  if (current !== undefined && current !== null) {
    parts.push(String(current))
  }

  const line = parts.filter(Boolean).join(': ')
  return line || error.name
}

export function toTransportFailure(error: unknown): TransportFailure {
  return {
    code: isTimeoutError(error) ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT',
    message: describeError(error),
  }
}

export function formatFailure(failure: DeliveryFailure): string[] {
  switch (failure.code) {
    case 'REJECTED':
      return [`❌ ${failure.message}`, `Response body: ${failure.details ?? ''}`]
    case 'TRANSPORT':
    case 'TRANSPORT_TIMEOUT':
      return [`❌ Error sending webhook: ${failure.message}`]
    case 'USAGE': {
      const lines = [failure.message.trim()]
      if (failure.details) lines.push(...failure.details.trim().split('\n'))
      return lines
    }
  }
}
