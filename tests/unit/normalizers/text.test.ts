import { describe, it, expect } from 'vitest'
import {
  normalizeText,
  normalizeIdentifier,
} from '../../../src/core/normalizers/text'

describe('Text Normalizers', () => {
  describe('normalizeText', () => {
    it('should lowercase and strip punctuation', () => {
      expect(normalizeText('Doe, J.')).toBe('doe j')
      expect(normalizeText('Web-Testing: A Survey!')).toBe('webtesting a survey')
    })

    it('should strip diacritical marks', () => {
      expect(normalizeText('Café Crème')).toBe('cafe creme')
      expect(normalizeText('  Über   Web-Testing!  ')).toBe('uber webtesting')
      expect(normalizeText('Łukasz Müller')).toBe('łukasz muller')
    })

    it('should apply compatibility decomposition', () => {
      expect(normalizeText('ﬁle')).toBe('file')
      expect(normalizeText('① first')).toBe('1 first')
    })

    it('should collapse and trim whitespace', () => {
      expect(normalizeText('a\t\n  b')).toBe('a b')
      expect(normalizeText('   spaced   out   ')).toBe('spaced out')
    })

    it('should remove underscores', () => {
      expect(normalizeText('foo_bar')).toBe('foobar')
    })

    it('should return an empty string for absent values', () => {
      expect(normalizeText(null)).toBe('')
      expect(normalizeText(undefined)).toBe('')
      expect(normalizeText(NaN)).toBe('')
    })

    it('should coerce numbers to text', () => {
      expect(normalizeText(2020)).toBe('2020')
    })

    it('should return an empty string for punctuation-only input', () => {
      expect(normalizeText('!!! ...')).toBe('')
    })

    it('should keep letters of other scripts', () => {
      expect(normalizeText('Тестирование ПО')).toBe('тестирование по')
    })

    it('should be idempotent', () => {
      const inputs = [
        'Web Testing Survey',
        '  Über   Web-Testing!  ',
        'ℌello',
        'ﬁle ①',
        'İstanbul',
        'ǅemal',
        'foo_bar -- baz',
        '',
      ]
      for (const input of inputs) {
        const once = normalizeText(input)
        expect(normalizeText(once)).toBe(once)
      }
    })
  })

  describe('normalizeIdentifier', () => {
    it('should lowercase and trim', () => {
      expect(normalizeIdentifier(' 10.1/ABC ')).toBe('10.1/abc')
      expect(normalizeIdentifier('10.1/abc')).toBe('10.1/abc')
    })

    it('should keep internal punctuation', () => {
      expect(normalizeIdentifier('10.1145/3368089.3409755')).toBe('10.1145/3368089.3409755')
    })

    it('should return an empty string for absent or blank values', () => {
      expect(normalizeIdentifier(null)).toBe('')
      expect(normalizeIdentifier(undefined)).toBe('')
      expect(normalizeIdentifier(NaN)).toBe('')
      expect(normalizeIdentifier('   ')).toBe('')
    })
  })
})
