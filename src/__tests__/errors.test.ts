import { describe, it, expect } from 'vitest'
import { ApiError, describeError, FileIOError, MissingConfigurationError, TransportError } from '../utils/errors'

describe('describeError', () => {
  it('maps auth failures to a token remedy', () => {
    expect(describeError(new ApiError(403, 'Unauthorized'))).toEqual({
      code: 'API_ERROR',
      message: 'Cloudflare API error 403: Unauthorized',
      remedy: 'Check CLOUDFLARE_TOKEN and that it has the Cloudflare Pages permission for this account.'
    })
  })

  it('omits the remedy when there is none', () => {
    expect(describeError(new ApiError(400, 'Invalid request'))).toEqual({ code: 'API_ERROR', message: 'Cloudflare API error 400: Invalid request' })
  })

  it('names the missing field', () => {
    const err = new MissingConfigurationError('account', 'pass --account or set CLOUDFLARE_ACCOUNT')
    expect(err.field).toBe('account')
    expect(describeError(err).message).toBe('Missing required configuration: account (pass --account or set CLOUDFLARE_ACCOUNT)')
  })

  it('keeps the cause of wrapped errors', () => {
    const cause = new Error('ENOENT: no such file or directory')
    const err = new FileIOError('vars.json', 'read', cause)
    expect(err.cause).toBe(cause)
    expect(err.message).toBe('Could not read vars.json: ENOENT: no such file or directory')
    expect(new TransportError('https://api.example.test', 'timeout').message).toBe('Request to https://api.example.test failed: timeout')
  })

  it('reduces unknown errors to their first line', () => {
    expect(describeError(new Error('boom\n  at somewhere'))).toEqual({ code: 'UNKNOWN_ERROR', message: 'boom' })
    expect(describeError('plain')).toEqual({ code: 'UNKNOWN_ERROR', message: 'plain' })
  })
})
