import { describe, expect, it } from 'vitest'
import { parseBoolean, parseNumber } from '../parse-env.ts'

describe('parseNumber', () => {
  it('should parse numeric strings', () => {
    expect(parseNumber('42', 1)).toBe(42)
    expect(parseNumber('0', 1)).toBe(0)
    expect(parseNumber('1.5', 1)).toBe(1.5)
  })

  it('should return the fallback for missing or invalid values', () => {
    expect(parseNumber(undefined, 7)).toBe(7)
    expect(parseNumber('', 7)).toBe(7)
    expect(parseNumber('abc', 7)).toBe(7)
    expect(parseNumber('Infinity', 7)).toBe(7)
  })
})

describe('parseBoolean', () => {
  it('should accept true/false, 1/0 and yes/no in any case', () => {
    expect(parseBoolean('true', false)).toBe(true)
    expect(parseBoolean(' YES ', false)).toBe(true)
    expect(parseBoolean('1', false)).toBe(true)
    expect(parseBoolean('False', true)).toBe(false)
    expect(parseBoolean('no', true)).toBe(false)
    expect(parseBoolean('0', true)).toBe(false)
  })

  it('should return the fallback for anything else', () => {
    expect(parseBoolean(undefined, true)).toBe(true)
    expect(parseBoolean('', false)).toBe(false)
    expect(parseBoolean('enabled', true)).toBe(true)
  })
})
