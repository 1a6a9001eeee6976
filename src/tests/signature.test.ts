import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import crypto from 'node:crypto'
import { SIGNATURE_HEADER, signPayload } from '../signature'

const FIXED_PAYLOAD =
  '{"hook_id":"deploy-staging","sha":"abc1234567890","ref":"refs/heads/main","repository":"org/repo","sender":"github-actions","triggered_by":"github-actions","workflow_run_id":""}'

describe('signPayload', () => {
  it('signs the fixed deployment payload', () => {
    assert.strictEqual(
      signPayload(FIXED_PAYLOAD, 'secret123'),
      'sha256=e10b943fa76c2d17111e99ecaeea8f9aec27bb111daacc8600e021ad228d4484'
    )
  })

  it('matches an independent HMAC-SHA256 over the same text', () => {
    const expected = crypto.createHmac('sha256', 'secret123').update(FIXED_PAYLOAD).digest('hex')
    assert.strictEqual(signPayload(FIXED_PAYLOAD, 'secret123'), `sha256=${expected}`)
  })

  it('produces sha256=<hex> of 71 characters', () => {
    const signature = signPayload('{"a":1}', 'test-secret')
    assert.match(signature, /^sha256=[0-9a-f]{64}$/)
    assert.strictEqual(signature.length, 71)
  })

  it('is deterministic', () => {
    assert.strictEqual(signPayload(FIXED_PAYLOAD, 'secret123'), signPayload(FIXED_PAYLOAD, 'secret123'))
  })

  it('changes when one byte of the payload changes', () => {
    const tampered = FIXED_PAYLOAD.replace('abc1234567890', 'abc1234567891')
    assert.notStrictEqual(signPayload(tampered, 'secret123'), signPayload(FIXED_PAYLOAD, 'secret123'))
  })

  it('changes when one byte of the secret changes', () => {
    assert.notStrictEqual(signPayload(FIXED_PAYLOAD, 'secret124'), signPayload(FIXED_PAYLOAD, 'secret123'))
  })

  it('signs empty input', () => {
    assert.strictEqual(
      signPayload('', ''),
      'sha256=b613679a0814d9ec772f95d778c35fc5ff1697c493715653c6c712144292c5ad'
    )
  })

  it('encodes non-ASCII input as UTF-8', () => {
    assert.strictEqual(
      signPayload('héllo', 'clé'),
      'sha256=91d9ef50d798155011df8385e8f772707a6ce937d8114ac1456f05231f2b6bad'
    )
  })

  it('names the GitHub-compatible header', () => {
    assert.strictEqual(SIGNATURE_HEADER, 'X-Hub-Signature-256')
  })
})
