// Public API for the rules engine
export { Board } from './game/board'
export { Game } from './game/game'
export { otherMark, markSymbol } from './game/mark'
export { tripleFromIndex } from './game/triple'
export { OccupiedSquareError } from './game/errors'
export { formatBoard, describeWinner } from './game/render'
export { runBenchmark } from './game/benchmark'
export {
  SQUARE_BITS,
  SQUARES,
  TRIPLES,
  TRIPLE_SQUARES,
  DEFAULT_STARTING_MARK,
} from './game/constants'
export type {
  Mark,
  MarkSymbol,
  Square,
  Triple,
  Winner,
  BenchmarkOptions,
  BenchmarkResult,
} from './game/types'
