import { wordRange } from '@wordvm/core'
import { PANEL_COLORS, type PanelColor, parseProgram, type Word, wordSchema } from '@wordvm/vm'
import { InvalidArgumentError } from 'commander'

/**
 * Option parsers handed to commander; a thrown InvalidArgumentError is
 * reported by commander as a usage error
 */

export function parseWord(value: string): Word {
  const parsed = wordSchema.safeParse(value.trim())
  if (!parsed.success) {
    throw new InvalidArgumentError(`"${value}" is not a 64-bit integer`)
  }
  return parsed.data
}

export function parseWordList(value: string): Word[] {
  const [error, words] = parseProgram(value)
  if (error) {
    throw new InvalidArgumentError(error.message)
  }
  return words
}

// 9 values already mean 362880 network runs
export const MAX_RANGE_LENGTH = 9

/**
 * Inclusive range written as `start..end`, at most `MAX_RANGE_LENGTH` values
 */
export function parseWordRange(value: string): Word[] {
  const match = /^\s*([+-]?\d+)\s*\.\.\s*([+-]?\d+)\s*$/.exec(value)
  if (!match) {
    throw new InvalidArgumentError(`"${value}" is not a range like 0..4`)
  }
  const start = parseWord(match[1])
  const end = parseWord(match[2])
  if (start > end) {
    throw new InvalidArgumentError(`Range ${value} is empty`)
  }
  if (end - start >= BigInt(MAX_RANGE_LENGTH)) {
    throw new InvalidArgumentError(
      `Range ${value} has more than ${MAX_RANGE_LENGTH} values`,
    )
  }
  return wordRange(start, end)
}

export function parseStartColor(value: string): PanelColor {
  switch (value.toLowerCase()) {
    case 'black':
      return PANEL_COLORS.BLACK
    case 'white':
      return PANEL_COLORS.WHITE
    default:
      throw new InvalidArgumentError(`Unknown panel color "${value}"`)
  }
}
