import { InputExhaustedError } from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import { ScriptedIO } from '../scripted'

describe('ScriptedIO', () => {
  it('should hand out inputs in order', () => {
    const io = new ScriptedIO([4n, 5n])

    expect(io.requestInput()).toEqual([undefined, 4n])
    expect(io.remainingInputs).toBe(1)
    expect(io.requestInput()).toEqual([undefined, 5n])
    expect(io.remainingInputs).toBe(0)
  })

  it('should fault once the inputs are used up', () => {
    const io = new ScriptedIO()

    const [error] = io.requestInput()

    expect(error).toBeInstanceOf(InputExhaustedError)
  })

  it('should collect outputs', () => {
    const io = new ScriptedIO()

    io.emitOutput(1n)
    io.emitOutput(-2n)

    expect(io.outputs).toEqual([1n, -2n])
    expect(io.lastOutput).toBe(-2n)
  })

  it('should not see later changes to the input list', () => {
    const inputs = [1n]
    const io = new ScriptedIO(inputs)
    inputs.push(2n)

    expect(io.remainingInputs).toBe(1)
  })
})
