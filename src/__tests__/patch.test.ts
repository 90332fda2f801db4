import { describe, it, expect } from 'vitest'
import { buildPatch, diffEnvironment, isEmptyPatch } from '../core/env/patch'

describe('diffEnvironment', () => {
  it('splits keys into added, changed and removed', () => {
    expect(diffEnvironment({ A: '1', B: '2', C: '3' }, { A: '1', B: '20', D: '4' }))
      .toEqual({ added: ['D'], changed: ['B'], removed: ['C'] })
  })
})

describe('buildPatch', () => {
  it('sends only changes and leaves null environments out', () => {
    const patch = buildPatch(
      { production: { A: '1', B: '2', C: '3' }, preview: { P: 'x' } },
      { production: { A: '1', B: '20', D: '4' }, preview: null }
    )
    expect(patch.deploymentConfigs).toEqual({
      production: {
        env_vars: {
          D: { type: 'plain_text', value: '4' },
          B: { type: 'plain_text', value: '20' },
          C: null
        }
      }
    })
    expect(Object.keys(patch.deploymentConfigs)).toEqual(['production'])
    expect(patch.changes.preview).toBeUndefined()
    expect(isEmptyPatch(patch)).toBe(false)
  })

  it('deletes every remote variable when the desired map is empty', () => {
    const patch = buildPatch({ production: {}, preview: { P: 'x', Q: 'y' } }, { production: null, preview: {} })
    expect(patch.deploymentConfigs).toEqual({ preview: { env_vars: { P: null, Q: null } } })
  })

  it('is empty when the remote already matches', () => {
    const patch = buildPatch({ production: { A: '1' }, preview: {} }, { production: { A: '1' }, preview: {} })
    expect(isEmptyPatch(patch)).toBe(true)
    expect(patch.changes).toEqual({})
  })

  it('treats a missing current environment as empty', () => {
    const patch = buildPatch({ production: null, preview: null }, { production: { A: '1' }, preview: null })
    expect(patch.deploymentConfigs).toEqual({ production: { env_vars: { A: { type: 'plain_text', value: '1' } } } })
  })
})
