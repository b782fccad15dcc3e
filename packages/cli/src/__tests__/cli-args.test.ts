import { InvalidArgumentError } from 'commander'
import { describe, expect, it } from 'vitest'
import { createCli } from '../cli'
import { createAmplifyCommand } from '../commands/amplify'
import { createPaintCommand } from '../commands/paint'
import { createRunCommand } from '../commands/run'
import {
  MAX_RANGE_LENGTH,
  parseStartColor,
  parseWord,
  parseWordList,
  parseWordRange,
} from '../utils/validation'

describe('Word VM CLI Arguments', () => {
  describe('Validation Functions', () => {
    it('should parse single words', () => {
      expect(parseWord(' 12 ')).toBe(12n)
      expect(parseWord('-9223372036854775808')).toBe(-(2n ** 63n))
      expect(() => parseWord('1.5')).toThrow(InvalidArgumentError)
      expect(() => parseWord('1.5')).toThrow('"1.5" is not a 64-bit integer')
    })

    it('should parse comma separated word lists', () => {
      expect(parseWordList('4,3,2')).toEqual([4n, 3n, 2n])
      expect(() => parseWordList('4,x')).toThrow(
        'Invalid word "x" at index 1: not an integer',
      )
    })

    it('should expand inclusive ranges', () => {
      expect(parseWordRange('5..9')).toEqual([5n, 6n, 7n, 8n, 9n])
      expect(parseWordRange('-1..1')).toEqual([-1n, 0n, 1n])
      expect(() => parseWordRange('9..5')).toThrow('Range 9..5 is empty')
      expect(() => parseWordRange('a..b')).toThrow(InvalidArgumentError)
    })

    it('should cap the number of values in a range', () => {
      expect(parseWordRange('0..8')).toHaveLength(MAX_RANGE_LENGTH)
      expect(() => parseWordRange('0..9')).toThrow(
        'Range 0..9 has more than 9 values',
      )
      expect(() => parseWordRange('0..9223372036854775807')).toThrow(
        InvalidArgumentError,
      )
    })

    it('should parse panel colors', () => {
      expect(parseStartColor('White')).toBe(1n)
      expect(parseStartColor('black')).toBe(0n)
      expect(() => parseStartColor('red')).toThrow('Unknown panel color "red"')
    })
  })

  describe('Commands', () => {
    it('should register every command', () => {
      const names = createCli().commands.map((command) => command.name())

      expect(names).toEqual(['run', 'amplify', 'paint'])
    })

    it('should have the run options', () => {
      const options = createRunCommand().options.map((option) => option.long)

      expect(options).toEqual(['--input', '--trace'])
    })

    it('should have the amplify options with their defaults', () => {
      const command = createAmplifyCommand()
      const options = command.options.map((option) => option.long)
      const signal = command.options.find((option) => option.long === '--signal')

      expect(options).toEqual(['--phases', '--range', '--feedback', '--signal'])
      expect(signal?.short).toBe('-s')
      expect(signal?.defaultValue).toBe(0n)
    })

    it('should default the painting robot to a black start panel', () => {
      const command = createPaintCommand()
      const start = command.options.find((option) => option.long === '--start')

      expect(start?.defaultValue).toBe(0n)
      expect(start?.description).toContain('black or white')
    })
  })
})
