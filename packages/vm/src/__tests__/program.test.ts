import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ProgramFormatError } from '@wordvm/types'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { formatProgram, loadProgram, parseProgram } from '../program'

describe('Program images', () => {
  describe('parseProgram', () => {
    it('should split on commas and whitespace', () => {
      expect(parseProgram('1,2, 3\n4\t-5\n')).toEqual([
        undefined,
        [1n, 2n, 3n, 4n, -5n],
      ])
    })

    it('should accept the full signed 64-bit range', () => {
      const [, words] = parseProgram(
        '-9223372036854775808,9223372036854775807,+7',
      )

      expect(words).toEqual([-(2n ** 63n), 2n ** 63n - 1n, 7n])
    })

    it('should reject an empty image', () => {
      const [error] = parseProgram(' \n,, ')

      expect(error).toBeInstanceOf(ProgramFormatError)
      expect(error?.message).toBe('Program image is empty')
    })

    it('should name the first malformed word', () => {
      const [error] = parseProgram('1,2,x3,4')

      expect(error?.message).toBe('Invalid word "x3" at index 2: not an integer')
    })

    it('should reject words outside 64 bits', () => {
      const [error] = parseProgram('9223372036854775808')

      expect(error?.message).toBe(
        'Invalid word "9223372036854775808" at index 0: outside the signed 64-bit range',
      )
    })
  })

  it('should format words back to a comma separated image', () => {
    expect(formatProgram([1002n, 4n, -3n])).toBe('1002,4,-3')
  })

  describe('loadProgram', () => {
    let directory: string

    beforeAll(async () => {
      directory = await mkdtemp(join(tmpdir(), 'wordvm-'))
    })

    afterAll(async () => {
      await rm(directory, { recursive: true, force: true })
    })

    it('should read and parse a program file', async () => {
      const path = join(directory, 'program.txt')
      await writeFile(path, '104,7,99\n')

      expect(await loadProgram(path)).toEqual([undefined, [104n, 7n, 99n]])
    })

    it('should report a missing file', async () => {
      const [error] = await loadProgram(join(directory, 'missing.txt'))

      expect(error?.message).toContain('ENOENT')
    })
  })
})
