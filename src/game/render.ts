import type { Winner } from './types'
import type { Board } from './board'
import { ROWS } from './constants'
import { markSymbol } from './mark'

// One line per row, A at the top:
// | |O|X|
// |X|X|O|
// |X| |O|
export const formatBoard = (board: Board): string =>
  ROWS.map(row => {
    const cells = row.map(square => {
      const mark = board.markAt(square)
      return mark ? markSymbol(mark) : ' '
    })
    return `|${cells.join('|')}|`
  }).join('\n')

export const describeWinner = (winner: Winner | null): string => {
  if (!winner) return 'No winner'
  return `${markSymbol(winner.mark)} wins on ${winner.triple}`
}
