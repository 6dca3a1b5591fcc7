import type { Mark, Square, Winner } from './types'
import { DEFAULT_STARTING_MARK } from './constants'
import { Board } from './board'
import { otherMark } from './mark'

/**
 * Whose turn it is plus the board. Like Board, a Game is a value: makeMove
 * returns the next Game and leaves this one untouched.
 *
 * There is no finished state. Moves are still accepted after a line is
 * complete, so callers that want to stop must check calculateWinner().
 */
export class Game {
  public readonly currentMark: Mark
  public readonly board: Board

  constructor (startingMark: Mark, board: Board = Board.empty()) {
    this.currentMark = startingMark
    this.board = board
  }

  static default (): Game {
    return new Game(DEFAULT_STARTING_MARK)
  }

  // Throws OccupiedSquareError from the board; the turn does not pass.
  public makeMove (square: Square): Game {
    const board = this.board.makeMove(this.currentMark, square)
    return new Game(otherMark(this.currentMark), board)
  }

  public calculateWinner (): Winner | null {
    return this.board.calculateWinner()
  }
}
