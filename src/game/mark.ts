import type { Mark, MarkSymbol } from './types'
import { MARK_SYMBOLS } from './constants'

export const otherMark = (mark: Mark): Mark => mark === 'Cross' ? 'Naught' : 'Cross'

export const markSymbol = (mark: Mark): MarkSymbol => MARK_SYMBOLS[mark]
