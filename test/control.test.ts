import { test, describe } from 'node:test'
import assert from 'node:assert'
import { decodeRequest, encodeRequest } from '../src/protocol/control'
import {
  LISTINGS,
  REPLY,
  formatAuthError,
  formatFetchTarget,
  formatListing,
  parseAuthReply,
  parseFetchReply,
  parseListing,
} from '../src/protocol/replies'
import { AuthError, ProtocolError } from '../src/core/errors'

describe('decodeRequest', () => {
  test('accepts a well-formed AUTH', () => {
    const decoded = decodeRequest('{"type":"AUTH","username":"alice","password":"s1","transferPort":4000}')
    assert.deepStrictEqual(decoded, {
      kind: 'request',
      request: { type: 'AUTH', username: 'alice', password: 's1', transferPort: 4000 }
    })
  })

  test('round-trips through encodeRequest', () => {
    const buf = encodeRequest({ type: 'SHARE', username: 'alice', filename: 'a.txt' })
    assert.deepStrictEqual(decodeRequest(buf), {
      kind: 'request',
      request: { type: 'SHARE', username: 'alice', filename: 'a.txt' }
    })
  })

  test('unknown type is reported as unknown, not malformed', () => {
    assert.deepStrictEqual(decodeRequest('{"type":"PING","username":"alice"}'), { kind: 'unknown', type: 'PING' })
  })

  test('invalid JSON is malformed', () => {
    assert.deepStrictEqual(decodeRequest('{not json'), { kind: 'malformed', reason: 'not valid JSON' })
  })

  test('non-object payloads are malformed', () => {
    assert.deepStrictEqual(decodeRequest('[1,2]'), { kind: 'malformed', reason: 'expected a JSON object' })
    assert.deepStrictEqual(decodeRequest('"AUTH"'), { kind: 'malformed', reason: 'expected a JSON object' })
    assert.deepStrictEqual(decodeRequest('null'), { kind: 'malformed', reason: 'expected a JSON object' })
  })

  test('missing type is malformed', () => {
    assert.deepStrictEqual(decodeRequest('{"username":"alice"}'), { kind: 'malformed', reason: 'missing "type"' })
  })

  test('known type with a bad field is malformed and names the field', () => {
    const decoded = decodeRequest('{"type":"AUTH","username":"alice","password":"s1","transferPort":"4000"}')
    assert.strictEqual(decoded.kind, 'malformed')
    if (decoded.kind !== 'malformed') return
    assert.ok(decoded.reason.startsWith('AUTH: transferPort '))
  })

  test('SHARE without filename is malformed', () => {
    assert.strictEqual(decodeRequest('{"type":"SHARE","username":"alice"}').kind, 'malformed')
  })

  test('SEARCH accepts an empty pattern', () => {
    assert.strictEqual(decodeRequest('{"type":"SEARCH","username":"alice","filename":""}').kind, 'request')
  })
})

describe('listing replies', () => {
  test('formats counts and names', () => {
    assert.strictEqual(formatListing(LISTINGS.peers, ['bob', 'carol']), '2 active peers:\nbob\ncarol')
    assert.strictEqual(formatListing(LISTINGS.files, ['a.txt']), '1 file shared:\na.txt')
    assert.strictEqual(formatListing(LISTINGS.matches, ['a.txt', 'b.txt']), '2 files found:\na.txt\nb.txt')
  })

  test('formats the empty cases distinctly', () => {
    assert.strictEqual(formatListing(LISTINGS.peers, []), 'No active peers')
    assert.strictEqual(formatListing(LISTINGS.files, []), 'No files shared')
    assert.strictEqual(formatListing(LISTINGS.matches, []), 'No files found')
  })

  test('parses what it formats', () => {
    assert.deepStrictEqual(parseListing(LISTINGS.peers, '2 active peers:\nbob\ncarol'), ['bob', 'carol'])
    assert.deepStrictEqual(parseListing(LISTINGS.matches, 'No files found'), [])
  })

  test('rejects a wrong header or count', () => {
    assert.strictEqual(parseListing(LISTINGS.peers, '2 files found:\na\nb'), null)
    assert.strictEqual(parseListing(LISTINGS.peers, '3 active peers:\nbob'), null)
    assert.strictEqual(parseListing(LISTINGS.files, REPLY.MALFORMED), null)
  })
})

describe('auth replies', () => {
  test('OK means success', () => {
    assert.strictEqual(parseAuthReply('OK'), null)
  })

  test('each rejection maps back to its code', () => {
    for (const code of ['ALREADY_ACTIVE', 'UNKNOWN_USER', 'BAD_PASSWORD'] as const) {
      const error = parseAuthReply(formatAuthError(code))
      assert.ok(error instanceof AuthError)
      assert.strictEqual(error.code, code)
    }
  })

  test('wire text matches the protocol', () => {
    assert.strictEqual(formatAuthError('ALREADY_ACTIVE'), 'ERROR: User already logged in')
    assert.strictEqual(formatAuthError('UNKNOWN_USER'), 'ERROR: Username not found')
    assert.strictEqual(formatAuthError('BAD_PASSWORD'), 'ERROR: Incorrect password')
  })

  test('generic error and garbage are protocol errors', () => {
    const malformed = parseAuthReply(REPLY.MALFORMED)
    assert.ok(malformed instanceof ProtocolError)
    assert.strictEqual(malformed.code, 'MALFORMED')

    const garbage = parseAuthReply('hello')
    assert.ok(garbage instanceof ProtocolError)
    assert.strictEqual(garbage.code, 'UNEXPECTED_REPLY')
  })
})

describe('fetch replies', () => {
  test('target is JSON with username, address and port', () => {
    const text = formatFetchTarget({ username: 'bob', address: '127.0.0.1', port: 4100 })
    assert.strictEqual(text, '{"username":"bob","address":"127.0.0.1","port":4100}')
    assert.deepStrictEqual(parseFetchReply(text), { username: 'bob', address: '127.0.0.1', port: 4100 })
  })

  test('not found is null', () => {
    assert.strictEqual(parseFetchReply('File not found'), null)
  })

  test('incomplete target is a protocol error', () => {
    const result = parseFetchReply('{"username":"bob","address":"127.0.0.1"}')
    assert.ok(result instanceof ProtocolError)
    assert.strictEqual(result.code, 'UNEXPECTED_REPLY')
  })
})
