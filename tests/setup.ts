import { afterEach, beforeEach, vi } from 'vitest'
import { logger } from '../src/utils/logger'
import { setColorMode } from '../src/utils/colors'

function resetLogger(): void {
  logger.setLevel('info')
  logger.setNoEmoji(false)
  logger.setTimestamps(false)
  logger.setRedactors([])
  setColorMode('never')
}

beforeEach(() => {
  resetLogger()
  process.exitCode = undefined
})

afterEach(() => {
  vi.restoreAllMocks()
  vi.unstubAllEnvs()
  vi.unstubAllGlobals()
  resetLogger()
  process.exitCode = undefined
})
