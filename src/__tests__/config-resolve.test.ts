import { describe, it, expect } from 'vitest'
import {
  resolveGetEnvVarsConfig,
  resolveSetEnvVarsConfig,
  resolveToEnvFileConfig
} from '../core/config/resolve'
import { InvalidConfigurationError, MissingConfigurationError } from '../utils/errors'

function missingField(fn: () => unknown): string {
  try { fn() } catch (err) {
    if (err instanceof MissingConfigurationError) return err.field
    throw err
  }
  throw new Error('expected MissingConfigurationError')
}

const fullEnv = {
  CLOUDFLARE_ACCOUNT: 'env-account',
  CLOUDFLARE_TOKEN: 'env-token',
  CF_PAGES_PROJECT: 'env-project',
  CF_PAGES_DEPLOYMENT: 'env-deployment',
  CF_PAGES_OUTPUT: 'env-output.json',
  CF_PAGES_FILE: 'env-file.json'
}

describe('resolveGetEnvVarsConfig', () => {
  it('prefers explicit options over environment variables', () => {
    const cfg = resolveGetEnvVarsConfig({ account: 'opt-account', token: 'opt-token', project: 'opt-project', deployment: 'opt-dep', output: 'opt.json' }, fullEnv)
    expect(cfg.credentials).toEqual({ account: 'opt-account', token: 'opt-token' })
    expect(cfg.ref).toEqual({ project: 'opt-project', deployment: 'opt-dep' })
    expect(cfg.output).toBe('opt.json')
  })

  it('falls back to environment variables', () => {
    const cfg = resolveGetEnvVarsConfig({}, fullEnv)
    expect(cfg.credentials).toEqual({ account: 'env-account', token: 'env-token' })
    expect(cfg.ref).toEqual({ project: 'env-project', deployment: 'env-deployment' })
    expect(cfg.output).toBe('env-output.json')
  })

  it('leaves optional fields unset', () => {
    const cfg = resolveGetEnvVarsConfig({ account: 'a', token: 't', project: 'p' }, {})
    expect(cfg.ref.deployment).toBeUndefined()
    expect(cfg.output).toBeUndefined()
  })

  it('names the missing field', () => {
    expect(missingField(() => resolveGetEnvVarsConfig({ token: 't', project: 'p' }, {}))).toBe('account')
    expect(missingField(() => resolveGetEnvVarsConfig({ account: 'a', project: 'p' }, {}))).toBe('token')
    expect(missingField(() => resolveGetEnvVarsConfig({ account: 'a', token: 't' }, {}))).toBe('project')
  })

  it('treats empty strings as unset', () => {
    expect(missingField(() => resolveGetEnvVarsConfig({ account: 'a', project: 'p' }, { CLOUDFLARE_TOKEN: '' }))).toBe('token')
    expect(missingField(() => resolveGetEnvVarsConfig({ account: '', token: 't', project: 'p' }, {}))).toBe('account')
  })

  it('explains where the value can come from', () => {
    expect(() => resolveGetEnvVarsConfig({ account: 'a', token: 't' }, {}))
      .toThrow('Missing required configuration: project (pass --project or set CF_PAGES_PROJECT)')
  })
})

describe('resolveSetEnvVarsConfig', () => {
  it('requires the file', () => {
    expect(missingField(() => resolveSetEnvVarsConfig({ account: 'a', token: 't', project: 'p' }, {}))).toBe('file')
  })

  it('reads the file from CF_PAGES_FILE and never targets a deployment', () => {
    const cfg = resolveSetEnvVarsConfig({}, fullEnv)
    expect(cfg.file).toBe('env-file.json')
    expect(cfg.ref).toEqual({ project: 'env-project' })
  })
})

describe('resolveToEnvFileConfig', () => {
  it('defaults to production without empty values', () => {
    const cfg = resolveToEnvFileConfig({ file: 'vars.json' }, {})
    expect(cfg).toEqual({ environment: 'production', empty: false, file: 'vars.json', output: undefined })
  })

  it('does not need credentials', () => {
    expect(resolveToEnvFileConfig({ file: 'vars.json', environment: 'preview' }, {}).environment).toBe('preview')
  })

  it('prefers --environment over CF_PAGES_ENVIRONMENT', () => {
    expect(resolveToEnvFileConfig({ file: 'f' }, { CF_PAGES_ENVIRONMENT: 'preview' }).environment).toBe('preview')
    expect(resolveToEnvFileConfig({ file: 'f', environment: 'production' }, { CF_PAGES_ENVIRONMENT: 'preview' }).environment).toBe('production')
  })

  it('rejects unknown environments', () => {
    expect(() => resolveToEnvFileConfig({ file: 'f', environment: 'staging' }, {})).toThrow(InvalidConfigurationError)
  })

  it('parses CF_PAGES_EMPTY as a boolean', () => {
    expect(resolveToEnvFileConfig({ file: 'f' }, { CF_PAGES_EMPTY: 'true' }).empty).toBe(true)
    expect(resolveToEnvFileConfig({ file: 'f' }, { CF_PAGES_EMPTY: '0' }).empty).toBe(false)
    expect(resolveToEnvFileConfig({ file: 'f', empty: true }, { CF_PAGES_EMPTY: 'false' }).empty).toBe(true)
    expect(() => resolveToEnvFileConfig({ file: 'f' }, { CF_PAGES_EMPTY: 'maybe' })).toThrow(InvalidConfigurationError)
  })

  it('requires the positional file', () => {
    expect(missingField(() => resolveToEnvFileConfig({}, fullEnv))).toBe('file')
  })
})
