import type { Square } from './types'

/**
 * Thrown when a move targets a square either mark already holds.
 * The only recoverable failure in the engine.
 */
export class OccupiedSquareError extends Error {
  public readonly square: Square

  constructor (square: Square) {
    super(`${square} is currently occupied`)
    this.name = 'OccupiedSquareError'
    this.square = square
  }
}

// Broken internal state, not bad input. Callers should let this propagate.
export function invariant (condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violation: ${message}`)
  }
}
