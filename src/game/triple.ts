import type { Triple } from './types'
import { TRIPLES } from './constants'
import { invariant } from './errors'

export function tripleFromIndex (index: number): Triple {
  const triple: Triple | undefined = TRIPLES[index]
  invariant(Number.isInteger(index) && triple !== undefined, `no triple for bit group ${index}`)
  return triple
}
