import { afterEach, describe, expect, it, vi } from 'vitest'
import { colorFormatters, defaultLoggers, defaultSettings } from './settings'

describe('settings', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('uses the console loggers and colored diagnostics by default', () => {
    expect(defaultSettings()).toEqual({ loggers: defaultLoggers, formatters: colorFormatters })
  })

  it('prints errors to the standard error', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})

    defaultLoggers.error('unexpected end of input')

    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy).toHaveBeenCalledWith(expect.stringContaining('unexpected end of input'))
  })
})
