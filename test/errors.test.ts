import {
  createLogger,
  DcbError,
  IntegrityError,
  TransportError,
  translateError,
} from '../src'

test('errors carry their class name and cause', () => {
  const cause = new Error('underlying')
  const error = new IntegrityError('condition failed', cause)

  expect(error).toBeInstanceOf(DcbError)
  expect(error.name).toBe('IntegrityError')
  expect(error.cause).toBe(cause)
})

test('anything thrown becomes a client error', () => {
  const integrity = new IntegrityError('kept')
  expect(translateError(integrity)).toBe(integrity)

  const fromError = translateError(new Error('socket closed'))
  expect(fromError).toBeInstanceOf(TransportError)
  expect(fromError.message).toBe('socket closed')

  expect(translateError('boom')).toEqual(new TransportError('boom'))
})

describe('createLogger', () => {
  const level = process.env.DCB_LOG_LEVEL

  afterEach(() => {
    if (level === undefined) delete process.env.DCB_LOG_LEVEL
    else process.env.DCB_LOG_LEVEL = level
  })

  test('defaults to info', () => {
    delete process.env.DCB_LOG_LEVEL
    expect(createLogger().level).toBe('info')
  })

  test('takes its level from the environment', () => {
    process.env.DCB_LOG_LEVEL = 'warn'
    expect(createLogger('dcb-test').level).toBe('warn')
  })
})
