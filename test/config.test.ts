import { test, describe, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { loadCredentials, parseCredentials, parsePort } from '../src/core/config'
import { ConfigError } from '../src/core/errors'

process.env.LOG_LEVEL = 'silent'

describe('parseCredentials', () => {
  test('reads one username/password pair per line', () => {
    const creds = parseCredentials('alice s1\nbob s2\n')
    assert.strictEqual(creds.size, 2)
    assert.strictEqual(creds.get('alice'), 's1')
    assert.strictEqual(creds.get('bob'), 's2')
  })

  test('skips blank lines and handles CRLF', () => {
    const creds = parseCredentials('\r\nalice s1\r\n\r\n  bob s2  \r\n')
    assert.deepStrictEqual([...creds.entries()], [['alice', 's1'], ['bob', 's2']])
  })

  test('keeps everything after the first space as the password', () => {
    const creds = parseCredentials('carol correct horse battery')
    assert.strictEqual(creds.get('carol'), 'correct horse battery')
  })

  test('rejects a line without a password', () => {
    assert.throws(
      () => parseCredentials('alice s1\nbob\n', 'creds.txt'),
      (err: unknown) => err instanceof ConfigError
        && err.code === 'INVALID_CREDENTIALS'
        && err.message === 'creds.txt:2: expected "username password"'
    )
  })
})

describe('loadCredentials', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'filemesh-config-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  test('loads an explicit file', () => {
    const file = path.join(dir, 'credentials.txt')
    fs.writeFileSync(file, 'alice test-secret\n')
    const creds = loadCredentials(file)
    assert.strictEqual(creds.get('alice'), 'test-secret')
  })

  test('missing file is a ConfigError', () => {
    assert.throws(
      () => loadCredentials(path.join(dir, 'nope.txt')),
      (err: unknown) => err instanceof ConfigError && err.code === 'MISSING_CREDENTIALS'
    )
  })
})

describe('parsePort', () => {
  test('accepts ports in range', () => {
    assert.strictEqual(parsePort('5000', 'port'), 5000)
    assert.strictEqual(parsePort('0', 'port'), 0)
  })

  test('rejects missing, non-numeric and out-of-range values', () => {
    for (const value of [undefined, '', 'abc', '70000', '12.5', '-1']) {
      assert.throws(() => parsePort(value, 'port'), ConfigError)
    }
  })
})
