import { describe, expect, it } from 'vitest'
import { LoggerProvider } from '../index'

describe('LoggerProvider', () => {
  it('should apply the level given to init', () => {
    const provider = new LoggerProvider()

    expect(provider.hasBeenInitializedValue).toBe(false)
    provider.init('debug')

    expect(provider.hasBeenInitializedValue).toBe(true)
    expect(provider.level).toBe('debug')
  })

  it('should keep the configured level when init has none', () => {
    const provider = new LoggerProvider()

    provider.init()

    expect(provider.level).toBe(process.env['LOG_LEVEL'] || 'info')
  })
})
