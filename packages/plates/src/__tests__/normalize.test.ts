import { describe, it, expect } from 'vitest'
import { extractPlate, isValidPlate } from '../normalize'

describe('extractPlate', () => {
  describe('IN plates', () => {
    it('accepts a clean plate', () => {
      expect(extractPlate('MH12AB1234', 'IN')).toBe('MH12AB1234')
    })

    it('strips spaces, dashes and case', () => {
      expect(extractPlate('mh 12-ab 1234', 'IN')).toBe('MH12AB1234')
    })

    it('finds the plate inside surrounding OCR noise', () => {
      expect(extractPlate('IND MH 12 AB 1234', 'IN')).toBe('MH12AB1234')
    })

    it('accepts single-digit districts and no series letters', () => {
      expect(extractPlate('DL3C1234', 'IN')).toBe('DL3C1234')
      expect(extractPlate('KA019999', 'IN')).toBe('KA019999')
    })

    it('rejects text without a plate shape', () => {
      expect(extractPlate('PARKING', 'IN')).toBeNull()
      expect(extractPlate('1234567', 'IN')).toBeNull()
    })
  })

  describe('no country (auto-detect)', () => {
    it('prefers the IN pattern', () => {
      expect(extractPlate('xx MH12AB1234 yy')).toBe('MH12AB1234')
    })

    it('falls back to generic alphanumeric', () => {
      expect(extractPlate('ab-cd-12')).toBe('ABCD12')
    })

    it('rejects too-short and too-long strings', () => {
      expect(extractPlate('AB1')).toBeNull()
      expect(extractPlate('ABCDEFGHIJK')).toBeNull()
    })

    it('returns null for empty or symbol-only input', () => {
      expect(extractPlate('')).toBeNull()
      expect(extractPlate(' -- ')).toBeNull()
    })
  })
})

describe('isValidPlate', () => {
  it('mirrors extractPlate', () => {
    expect(isValidPlate('MH12AB1234', 'IN')).toBe(true)
    expect(isValidPlate('HELLO', 'IN')).toBe(false)
  })
})
