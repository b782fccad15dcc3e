import { logger } from '@wordvm/core'
import { RobotCommandError } from '@wordvm/types'
import { beforeAll, describe, expect, it } from 'vitest'
import { ExecutionEngine } from '../../engine'
import { PANEL_COLORS, PaintingRobot, type Point } from '../painting-robot'

beforeAll(() => {
  logger.init()
})

describe('PaintingRobot', () => {
  it('should start facing up on a black panel', () => {
    const robot = new PaintingRobot()

    expect(robot.position).toEqual({ x: 0, y: 0 })
    expect(robot.direction).toEqual({ x: 0, y: -1 })
    expect(robot.requestInput()).toEqual([undefined, PANEL_COLORS.BLACK])
  })

  it('should paint, turn and move on each pair of outputs', () => {
    const robot = new PaintingRobot()

    robot.emitOutput(1n)
    robot.emitOutput(1n)
    robot.emitOutput(1n)
    robot.emitOutput(1n)
    robot.emitOutput(0n)
    robot.emitOutput(1n)

    expect(robot.position).toEqual({ x: 0, y: 1 })
    expect(robot.direction).toEqual({ x: -1, y: 0 })
    expect(robot.paintedPanelCount).toBe(3)
    expect(robot.colorAt({ x: 1, y: 0 })).toBe(PANEL_COLORS.WHITE)
    expect(robot.colorAt({ x: 1, y: 1 })).toBe(PANEL_COLORS.BLACK)
    expect(robot.render()).toBe('P1\n2 2\n00\n11\n')
  })

  it('should turn left through every heading', () => {
    const robot = new PaintingRobot()
    const headings: Point[] = []

    for (let turn = 0; turn < 4; turn++) {
      robot.emitOutput(0n)
      robot.emitOutput(0n)
      headings.push(robot.direction)
    }

    expect(headings).toEqual([
      { x: -1, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 0 },
      { x: 0, y: -1 },
    ])
    expect(robot.position).toEqual({ x: 0, y: 0 })
    expect(robot.paintedPanelCount).toBe(4)
  })

  it('should count a repainted panel once', () => {
    const robot = new PaintingRobot()

    robot.emitOutput(1n)
    robot.emitOutput(0n)
    for (let turn = 0; turn < 3; turn++) {
      robot.emitOutput(0n)
      robot.emitOutput(0n)
    }
    robot.emitOutput(0n)
    robot.emitOutput(1n)

    expect(robot.paintedPanelCount).toBe(4)
  })

  it('should reject values that are neither colors nor turns', () => {
    const badColor = new PaintingRobot()
    const badTurn = new PaintingRobot()
    badTurn.emitOutput(0n)

    const [colorError] = badColor.emitOutput(2n)
    const [turnError] = badTurn.emitOutput(5n)

    expect(colorError).toBeInstanceOf(RobotCommandError)
    expect(colorError?.message).toBe('Invalid panel color 2')
    expect(turnError?.message).toBe('Invalid turn command 5')
  })

  it('should render an empty hull and a white start panel', () => {
    expect(new PaintingRobot().render()).toBe('P1\n0 0\n')
    expect(
      new PaintingRobot({ startColor: PANEL_COLORS.WHITE }).render(),
    ).toBe('P1\n1 1\n0\n')
  })

  it('should be driven by a program through the engine', async () => {
    const robot = new PaintingRobot({ startColor: PANEL_COLORS.WHITE })
    // read the panel, repaint it the same colour, turn right
    const engine = new ExecutionEngine([3n, 100n, 4n, 100n, 104n, 1n, 99n], robot)

    const [error] = await engine.run()

    expect(error).toBeUndefined()
    expect(robot.paintedPanelCount).toBe(1)
    expect(robot.colorAt({ x: 0, y: 0 })).toBe(PANEL_COLORS.WHITE)
    expect(robot.position).toEqual({ x: 1, y: 0 })
  })

  it('should fault the engine on an invalid command', async () => {
    const robot = new PaintingRobot()
    const engine = new ExecutionEngine([104n, 3n, 99n], robot)

    const [error] = await engine.run()

    expect(error).toBeInstanceOf(RobotCommandError)
    expect(engine.status).toBe('faulted')
  })
})
