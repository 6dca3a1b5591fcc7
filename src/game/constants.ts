import type { Mark, Square, MarkSymbol, Triple } from './types'

// --- Square Encoding ---
// Each triple owns a 4-bit group starting at bit 31 - 4 * index: three bits,
// one per member square, then an empty gap bit. A square sets one bit in the
// group of every triple it belongs to. Do not renumber.
export const SQUARE_BITS: Readonly<Record<Square, number>> = {
  A1: 0x80080080,
  A2: 0x40008000,
  A3: 0x20000808,
  B1: 0x08040000,
  B2: 0x04004044,
  B3: 0x02000400,
  C1: 0x00820002,
  C2: 0x00402000,
  C3: 0x00200220,
}

// Row-major
export const SQUARES: readonly Square[] = [
  'A1', 'A2', 'A3',
  'B1', 'B2', 'B3',
  'C1', 'C2', 'C3',
]

export const ROWS: readonly (readonly Square[])[] = [
  ['A1', 'A2', 'A3'],
  ['B1', 'B2', 'B3'],
  ['C1', 'C2', 'C3'],
]

export const TRIPLES: readonly Triple[] = [
  'RowA', 'RowB', 'RowC',
  'Col1', 'Col2', 'Col3',
  'Diag1', 'Diag2',
]

export const TRIPLE_SQUARES: Readonly<Record<Triple, readonly [Square, Square, Square]>> = {
  RowA: ['A1', 'A2', 'A3'],
  RowB: ['B1', 'B2', 'B3'],
  RowC: ['C1', 'C2', 'C3'],
  Col1: ['A1', 'B1', 'C1'],
  Col2: ['A2', 'B2', 'C2'],
  Col3: ['A3', 'B3', 'C3'],
  Diag1: ['A1', 'B2', 'C3'],
  Diag2: ['A3', 'B2', 'C1'],
}

export const MARK_SYMBOLS: Readonly<Record<Mark, MarkSymbol>> = {
  Cross: 'X',
  Naught: 'O',
}

export const DEFAULT_STARTING_MARK: Mark = 'Cross'
