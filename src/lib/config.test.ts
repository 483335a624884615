import { describe, expect, it, vi } from 'vitest'
import path from 'node:path'
import { getConfig } from './config'

describe('getConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = getConfig({})
    expect(config).toMatchObject({
      entryFee: 25,
      adminPassword: null,
      tiebreak: 'all',
      feedTimeoutMs: 10_000,
      supabase: null,
      dataDir: path.resolve('data'),
    })
    expect(config.tournament.espnEventId).toBe('401811933')
  })

  it('reads overrides', () => {
    const config = getConfig({
      ENTRY_FEE: '40',
      ADMIN_PASSWORD: 'test-secret',
      STANDINGS_TIEBREAK: 'unique',
      TOURNAMENT_NAME: 'Fall Open',
      ESPN_EVENT_ID: '123',
    })
    expect(config.entryFee).toBe(40)
    expect(config.adminPassword).toBe('test-secret')
    expect(config.tiebreak).toBe('unique')
    expect(config.tournament).toMatchObject({ name: 'Fall Open', espnEventId: '123' })
  })

  it('ignores a bad number with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    expect(getConfig({ ENTRY_FEE: 'lots' }).entryFee).toBe(25)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('needs both Supabase variables', () => {
    expect(getConfig({ NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeNull()
    expect(
      getConfig({ NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_KEY: 'test-secret' }).supabase
    ).toEqual({ url: 'http://localhost:54321', serviceKey: 'test-secret' })
  })
})
