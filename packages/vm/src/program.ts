/**
 * Program images
 *
 * A program image is a flat list of signed 64-bit integers separated by
 * commas and/or whitespace.
 */

import { readFile } from 'node:fs/promises'
import {
  ProgramFormatError,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
  type Word,
} from '@wordvm/types'
import { z } from 'zod'

export const wordSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'not an integer')
  .transform((value, ctx) => {
    const word = BigInt(value)
    if (BigInt.asIntN(64, word) !== word) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'outside the signed 64-bit range',
      })
      return z.NEVER
    }
    return word
  })

export function parseProgram(text: string): Safe<Word[]> {
  const tokens = text.split(/[\s,]+/).filter((token) => token.length > 0)
  if (tokens.length === 0) {
    return safeError(new ProgramFormatError('Program image is empty'))
  }

  const words: Word[] = []
  for (const [index, token] of tokens.entries()) {
    const parsed = wordSchema.safeParse(token)
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid'
      return safeError(
        new ProgramFormatError(
          `Invalid word "${token}" at index ${index}: ${reason}`,
        ),
      )
    }
    words.push(parsed.data)
  }
  return safeResult(words)
}

export async function loadProgram(path: string): SafePromise<Word[]> {
  const [error, text] = await safeTry(readFile(path, 'utf-8'))
  if (error) {
    return safeError(error)
  }
  return parseProgram(text)
}

export function formatProgram(words: readonly Word[]): string {
  return words.join(',')
}
