// Game primitives
export type Mark = 'Cross' | 'Naught'
export type MarkSymbol = 'X' | 'O'

// Rows A-C, columns 1-3
export type Square =
  | 'A1' | 'A2' | 'A3'
  | 'B1' | 'B2' | 'B3'
  | 'C1' | 'C2' | 'C3'

// Winning lines, in bit-group order (index 0 = highest-order group)
export type Triple =
  | 'RowA' | 'RowB' | 'RowC'
  | 'Col1' | 'Col2' | 'Col3'
  | 'Diag1' | 'Diag2'

export interface Winner {
  mark: Mark
  triple: Triple
}

export interface BenchmarkOptions {
  games: number
  // Returns a float in [0, 1), like Math.random
  random?: () => number
}

export interface BenchmarkResult {
  games: number
  moves: number
  crossWins: number
  naughtWins: number
  undecided: number
  elapsedMs: number
}
