import type { Mark, Square, Winner } from './types'
import { SQUARE_BITS, SQUARES } from './constants'
import { OccupiedSquareError } from './errors'
import { tripleFromIndex } from './triple'

// Nonzero exactly where a bit and both of its neighbours are set, i.e. at the
// middle bit of every complete triple group.
const completedGroups = (mask: number): number =>
  (mask & (mask << 1) & (mask >>> 1)) >>> 0

// The highest set bit sits one below the top of its 4-bit group.
const groupIndex = (candidate: number): number => (Math.clz32(candidate) - 1) >> 2

/**
 * Occupancy of both marks as two 32-bit masks, each the OR of the
 * SQUARE_BITS a mark holds. Values are never mutated; makeMove returns a
 * new Board.
 */
export class Board {
  public readonly xboard: number
  public readonly oboard: number

  private constructor (xboard: number, oboard: number) {
    this.xboard = xboard >>> 0
    this.oboard = oboard >>> 0
  }

  static empty (): Board {
    return new Board(0x0, 0x0)
  }

  // Cross is checked first. Among several complete lines of one mark the
  // lowest triple index is reported. Neither case arises in legal play.
  public calculateWinner (): Winner | null {
    const x = completedGroups(this.xboard)
    if (x !== 0) return { mark: 'Cross', triple: tripleFromIndex(groupIndex(x)) }

    const o = completedGroups(this.oboard)
    if (o !== 0) return { mark: 'Naught', triple: tripleFromIndex(groupIndex(o)) }

    return null
  }

  public checkIndex (square: Square): void {
    if ((SQUARE_BITS[square] & (this.xboard | this.oboard)) !== 0) {
      throw new OccupiedSquareError(square)
    }
  }

  public makeMove (mark: Mark, square: Square): Board {
    this.checkIndex(square)
    const bits = SQUARE_BITS[square]
    if (mark === 'Cross') return new Board(this.xboard | bits, this.oboard)
    return new Board(this.xboard, this.oboard | bits)
  }

  public markAt (square: Square): Mark | null {
    const bits = SQUARE_BITS[square]
    if ((this.xboard & bits) !== 0) return 'Cross'
    if ((this.oboard & bits) !== 0) return 'Naught'
    return null
  }

  public emptySquares (): Square[] {
    const occupied = this.xboard | this.oboard
    return SQUARES.filter(square => (SQUARE_BITS[square] & occupied) === 0)
  }

  public isEmpty (): boolean {
    return this.xboard === 0 && this.oboard === 0
  }

  public equals (other: Board): boolean {
    return this.xboard === other.xboard && this.oboard === other.oboard
  }
}
