/**
 * Chooses which symbols a cycle trades, in order
 */
export interface SymbolSelector {
  select(): Promise<readonly string[]>
}

/**
 * Takes the first `count` symbols of the universe
 */
export class FixedSymbolSelector implements SymbolSelector {
  constructor(
    private readonly universe: readonly string[],
    private readonly count: number
  ) {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error('Symbol count must be a positive integer')
    }
  }

  async select(): Promise<readonly string[]> {
    if (this.universe.length === 0) {
      throw new Error('Trading universe is empty')
    }
    return this.universe.slice(0, this.count)
  }
}
