import { test, describe, beforeEach } from 'node:test'
import assert from 'node:assert'
import { Coordinator } from '../src/core/coordinator'
import { Session } from '../src/core/registry'

process.env.LOG_LEVEL = 'silent'

const CREDENTIALS = new Map([
  ['alice', 's1'],
  ['bob', 's2'],
])

const ALICE = { address: '127.0.0.1', port: 50001 }
const BOB = { address: '127.0.0.1', port: 50002 }

let clock = 0
let coordinator: Coordinator

function send(from: typeof ALICE, message: Record<string, unknown>): string | null {
  return coordinator.handle(JSON.stringify(message), from)
}

function login(username: string, password: string, from: typeof ALICE, transferPort: number): string | null {
  return send(from, { type: 'AUTH', username, password, transferPort })
}

beforeEach(() => {
  clock = 0
  coordinator = new Coordinator(CREDENTIALS, { livenessWindowMs: 3000, now: () => clock })
})

describe('authentication', () => {
  test('OK, then already logged in', () => {
    assert.strictEqual(login('alice', 's1', ALICE, 4001), 'OK')
    assert.strictEqual(login('alice', 's1', ALICE, 4001), 'ERROR: User already logged in')
  })

  test('unknown user and wrong password', () => {
    assert.strictEqual(login('zed', 's1', ALICE, 4001), 'ERROR: Username not found')
    assert.strictEqual(login('alice', 'bad', ALICE, 4001), 'ERROR: Incorrect password')
  })

  test('emits session:new with the source address', () => {
    const sessions: Session[] = []
    coordinator.on('session:new', (s: Session) => sessions.push(s))
    login('alice', 's1', ALICE, 4001)
    assert.strictEqual(sessions.length, 1)
    assert.deepStrictEqual(sessions[0].endpoint, ALICE)
    assert.strictEqual(sessions[0].transferPort, 4001)
  })
})

describe('status', () => {
  test('heartbeat gets no reply', () => {
    login('alice', 's1', ALICE, 4001)
    assert.strictEqual(send(ALICE, { type: 'STATUS', username: 'alice' }), null)
  })

  test('heartbeat from an unknown user is ignored silently', () => {
    assert.strictEqual(send(ALICE, { type: 'STATUS', username: 'ghost' }), null)
    assert.deepStrictEqual(coordinator.registry.getSessions(), [])
  })
})

describe('index operations', () => {
  beforeEach(() => {
    login('alice', 's1', ALICE, 4001)
    login('bob', 's2', BOB, 4002)
  })

  test('peers listing', () => {
    assert.strictEqual(send(ALICE, { type: 'LIST_PEERS', username: 'alice' }), '1 active peers:\nbob')
  })

  test('share, list, search, fetch and remove', () => {
    assert.strictEqual(send(BOB, { type: 'SHARE', username: 'bob', filename: 'a.txt' }), 'File shared successfully')
    assert.strictEqual(send(BOB, { type: 'SHARE', username: 'bob', filename: 'a.txt' }), 'File shared successfully')
    assert.strictEqual(send(BOB, { type: 'LIST_FILES', username: 'bob' }), '1 file shared:\na.txt')
    assert.strictEqual(send(ALICE, { type: 'LIST_FILES', username: 'alice' }), 'No files shared')
    assert.strictEqual(send(ALICE, { type: 'SEARCH', username: 'alice', filename: 'a.' }), '1 files found:\na.txt')
    assert.strictEqual(
      send(ALICE, { type: 'FETCH', username: 'alice', filename: 'a.txt' }),
      '{"username":"bob","address":"127.0.0.1","port":4002}'
    )
    assert.strictEqual(send(BOB, { type: 'REMOVE', username: 'bob', filename: 'a.txt' }), 'File successfully removed from sharing')
    assert.strictEqual(send(BOB, { type: 'REMOVE', username: 'bob', filename: 'a.txt' }), 'File removal failed')
    assert.strictEqual(send(ALICE, { type: 'SEARCH', username: 'alice', filename: 'a.txt' }), 'No files found')
    assert.strictEqual(send(ALICE, { type: 'FETCH', username: 'alice', filename: 'a.txt' }), 'File not found')
  })

  test('file events are emitted', () => {
    const events: string[] = []
    coordinator.on('file:shared', (e: { username: string, filename: string }) => events.push(`shared:${e.username}:${e.filename}`))
    coordinator.on('file:removed', (e: { username: string, filename: string }) => events.push(`removed:${e.username}:${e.filename}`))
    send(BOB, { type: 'SHARE', username: 'bob', filename: 'a.txt' })
    send(BOB, { type: 'REMOVE', username: 'bob', filename: 'a.txt' })
    send(BOB, { type: 'REMOVE', username: 'bob', filename: 'a.txt' })
    assert.deepStrictEqual(events, ['shared:bob:a.txt', 'removed:bob:a.txt'])
  })
})

describe('expiry sweep', () => {
  test('runs after every message and hides the expired peer', () => {
    const expired: string[] = []
    coordinator.on('session:expired', (s: Session) => expired.push(s.username))

    login('alice', 's1', ALICE, 4001)
    login('bob', 's2', BOB, 4002)
    send(BOB, { type: 'SHARE', username: 'bob', filename: 'a.txt' })

    clock = 2000
    send(ALICE, { type: 'STATUS', username: 'alice' })
    clock = 4000
    // this heartbeat triggers the sweep that evicts bob
    send(ALICE, { type: 'STATUS', username: 'alice' })

    assert.deepStrictEqual(expired, ['bob'])
    assert.strictEqual(send(ALICE, { type: 'LIST_PEERS', username: 'alice' }), 'No active peers')
    assert.strictEqual(send(ALICE, { type: 'FETCH', username: 'alice', filename: 'a.txt' }), 'File not found')
    assert.deepStrictEqual(coordinator.registry.getFiles(), [{ filename: 'a.txt', sharers: ['bob'] }])
  })

  test('malformed and unknown messages also trigger the sweep', () => {
    login('alice', 's1', ALICE, 4001)
    clock = 5000
    send(BOB, { type: 'NOPE' })
    assert.deepStrictEqual(coordinator.registry.getSessions(), [])
  })

  test('a stale session still blocks re-authentication until a sweep runs', () => {
    login('alice', 's1', ALICE, 4001)
    clock = 5000
    assert.strictEqual(login('alice', 's1', ALICE, 4001), 'ERROR: User already logged in')
    assert.strictEqual(login('alice', 's1', ALICE, 4001), 'OK')
  })
})

describe('bad input', () => {
  test('unknown types are dropped without reply', () => {
    assert.strictEqual(send(ALICE, { type: 'DANCE', username: 'alice' }), null)
  })

  test('malformed requests get a generic error and processing continues', () => {
    const rejected: string[] = []
    coordinator.on('request:rejected', (r: { reason: string }) => rejected.push(r.reason))

    assert.strictEqual(coordinator.handle('not json at all', ALICE), 'ERROR: Malformed request')
    assert.strictEqual(send(ALICE, { type: 'AUTH', username: 'alice' }), 'ERROR: Malformed request')
    assert.strictEqual(coordinator.handle(Buffer.from([0xff, 0x00, 0x13]), ALICE), 'ERROR: Malformed request')
    assert.strictEqual(login('alice', 's1', ALICE, 4001), 'OK')
    assert.strictEqual(rejected.length, 3)
  })
})
