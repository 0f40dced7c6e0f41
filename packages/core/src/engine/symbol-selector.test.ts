import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { DEFAULT_UNIVERSE } from '../config/app-config'
import { FixedSymbolSelector } from './symbol-selector'

describe('FixedSymbolSelector', () => {
  it('should pick the first five symbols of the default universe', async () => {
    const selector = new FixedSymbolSelector(DEFAULT_UNIVERSE, 5)
    assert.deepEqual(await selector.select(), ['RELIANCE', 'TCS', 'HDFCBANK', 'INFY', 'ICICIBANK'])
  })

  it('should return the whole universe when it is smaller than the count', async () => {
    assert.deepEqual(await new FixedSymbolSelector(['TCS', 'INFY'], 5).select(), ['TCS', 'INFY'])
  })

  it('should fail on an empty universe', async () => {
    await assert.rejects(new FixedSymbolSelector([], 5).select(), /universe is empty/)
  })

  it('should reject a non-positive count', () => {
    assert.throws(() => new FixedSymbolSelector(DEFAULT_UNIVERSE, 0), /positive integer/)
  })
})
