import { loadBookEnv } from '@/lib/env'

describe('lib/env', () => {
  it('falls back to defaults', () => {
    expect(loadBookEnv({})).toEqual({
      ENGINE_PATH: '/usr/bin/stockfish',
      ENGINE_THREADS: 1,
      ENGINE_HASH_MB: 64,
      ENGINE_TIMEOUT_MS: 120000,
      EXPLORER_BASE_URL: 'https://explorer.lichess.ovh',
      EXPLORER_TIMEOUT_MS: 30000,
      EXPLORER_RATE_LIMIT_PAUSE_MS: 60000,
    })
  })

  it('coerces numeric settings', () => {
    const env = loadBookEnv({ ENGINE_DEPTH: '18', ENGINE_THREADS: '4', ENGINE_MOVETIME_MS: '250' })
    expect(env.ENGINE_DEPTH).toBe(18)
    expect(env.ENGINE_THREADS).toBe(4)
    expect(env.ENGINE_MOVETIME_MS).toBe(250)
  })

  it('treats blank values as unset', () => {
    const env = loadBookEnv({ ENGINE_PATH: '   ', EXPLORER_TOKEN: '' })
    expect(env.ENGINE_PATH).toBe('/usr/bin/stockfish')
    expect(env.EXPLORER_TOKEN).toBeUndefined()
  })

  it('keeps an explorer token', () => {
    expect(loadBookEnv({ EXPLORER_TOKEN: 'test-token' }).EXPLORER_TOKEN).toBe('test-token')
  })

  it('rejects invalid values with the variable name', () => {
    expect(() => loadBookEnv({ ENGINE_DEPTH: 'deep' })).toThrow(/ENGINE_DEPTH/)
    expect(() => loadBookEnv({ ENGINE_THREADS: '0' })).toThrow(/ENGINE_THREADS/)
    expect(() => loadBookEnv({ EXPLORER_BASE_URL: 'not a url' })).toThrow(/EXPLORER_BASE_URL/)
  })
})
