import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadEnvLookup } from '../core/secrets/env'
import { FileIOError } from '../utils/errors'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'pages-env-sync-dotenv-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('loadEnvLookup', () => {
  it('returns the process environment as-is without a file', async () => {
    const processEnv = { CLOUDFLARE_ACCOUNT: 'proc-account' }
    expect(await loadEnvLookup({ processEnv })).toBe(processEnv)
  })

  it('layers the process environment over the dotenv file', async () => {
    const envFile = join(dir, 'ci.env')
    await writeFile(envFile, 'CF_PAGES_PROJECT=from-file\nCLOUDFLARE_ACCOUNT=file-account\nCLOUDFLARE_TOKEN=file-token\n', 'utf8')
    const env = await loadEnvLookup({ envFile, processEnv: { CLOUDFLARE_ACCOUNT: 'proc-account', CLOUDFLARE_TOKEN: '' } })
    expect(env.CF_PAGES_PROJECT).toBe('from-file')
    expect(env.CLOUDFLARE_ACCOUNT).toBe('proc-account')
    expect(env.CLOUDFLARE_TOKEN).toBe('file-token')
  })

  it('fails on a missing file', async () => {
    await expect(loadEnvLookup({ envFile: join(dir, 'missing.env'), processEnv: {} })).rejects.toBeInstanceOf(FileIOError)
  })
})
