import type { BenchmarkOptions, BenchmarkResult } from './types'
import { Game } from './game'

const pick = <T>(items: readonly T[], random: () => number): T => {
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[idx]
}

// Plays random games until a line is complete or the board is full.
export const runBenchmark = (options: BenchmarkOptions): BenchmarkResult => {
  const { games, random = Math.random } = options

  if (!Number.isInteger(games) || games <= 0) {
    throw new Error("Benchmark Error: 'games' must be a positive integer.")
  }

  console.log(`Starting Benchmark: ${games} random playouts...`)

  let moves = 0
  let crossWins = 0
  let naughtWins = 0
  let undecided = 0

  const start = performance.now()
  for (let g = 0; g < games; g++) {
    let game = Game.default()
    let winner = game.calculateWinner()
    let free = game.board.emptySquares()

    while (!winner && free.length > 0) {
      game = game.makeMove(pick(free, random))
      moves++
      winner = game.calculateWinner()
      free = game.board.emptySquares()
    }

    if (!winner) undecided++
    else if (winner.mark === 'Cross') crossWins++
    else naughtWins++
  }
  const elapsedMs = performance.now() - start

  console.table({
    Games: games,
    Moves: moves,
    'X Wins': crossWins,
    'O Wins': naughtWins,
    Undecided: undecided,
    'Time (ms)': Math.round(elapsedMs),
    'Moves/s': elapsedMs > 0 ? Math.round(moves / (elapsedMs / 1000)) : 0,
  })

  return { games, moves, crossWins, naughtWins, undecided, elapsedMs }
}
