import { describe, it, expect } from 'vitest'
import { ClaimLedger } from '../../../src/core/claim-ledger'
import { DedupError } from '../../../src/utils/errors'

describe('ClaimLedger', () => {
  it('starts with every record unclaimed', () => {
    const ledger = new ClaimLedger(3)

    expect(ledger.unclaimedIndices()).toEqual([0, 1, 2])
    expect(ledger.isClaimed(0)).toBe(false)
    expect(ledger.isAnchored(0)).toBe(false)
  })

  it('claims a duplicate and anchors its original', () => {
    const ledger = new ClaimLedger(3)

    const claim = ledger.claim(2, 0, 'exact-key')

    expect(claim).toEqual({ index: 2, originalIndex: 0, method: 'exact-key' })
    expect(ledger.isClaimed(2)).toBe(true)
    expect(ledger.isAnchored(0)).toBe(true)
    expect(ledger.isClaimable(0)).toBe(false)
    expect(ledger.isClaimable(1)).toBe(true)
    expect(ledger.unclaimedIndices()).toEqual([0, 1])
  })

  it('keeps claims in the order they were made', () => {
    const ledger = new ClaimLedger(4)

    ledger.claim(3, 1, 'group-key')
    ledger.claim(2, 0, 'fuzzy')

    expect(ledger.getClaims().map((c) => c.index)).toEqual([3, 2])
  })

  it('refuses to claim a record twice', () => {
    const ledger = new ClaimLedger(3)
    ledger.claim(1, 0, 'exact-key')

    expect(() => ledger.claim(1, 2, 'fuzzy')).toThrow(DedupError)
  })

  it('refuses to claim an original as a duplicate', () => {
    const ledger = new ClaimLedger(3)
    ledger.claim(1, 0, 'exact-key')

    expect(() => ledger.claim(0, 2, 'fuzzy')).toThrow(
      'Record at index 0 already has a terminal status'
    )
  })

  it('refuses a duplicate as an original', () => {
    const ledger = new ClaimLedger(3)
    ledger.claim(1, 0, 'exact-key')

    expect(() => ledger.claim(2, 1, 'fuzzy')).toThrow(
      'Record at index 1 is a duplicate and cannot be an original'
    )
  })

  it('handles an empty batch', () => {
    const ledger = new ClaimLedger(0)

    expect(ledger.unclaimedIndices()).toEqual([])
    expect(ledger.getClaims()).toEqual([])
  })
})
