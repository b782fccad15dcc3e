import {
  type IOCapability,
  RobotCommandError,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'

export const PANEL_COLORS = {
  BLACK: 0n,
  WHITE: 1n,
} as const

export const TURN_COMMANDS = {
  LEFT: 0n,
  RIGHT: 1n,
} as const

export type PanelColor = (typeof PANEL_COLORS)[keyof typeof PANEL_COLORS]

export interface Point {
  x: number
  y: number
}

interface Panel extends Point {
  color: PanelColor
}

export interface PaintingRobotOptions {
  /** Colour of the panel the robot starts on */
  startColor?: PanelColor
}

// Clockwise from up; y grows downwards
const HEADINGS: readonly Point[] = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
]

function isPanelColor(value: Word): value is PanelColor {
  return value === PANEL_COLORS.BLACK || value === PANEL_COLORS.WHITE
}

function keyOf({ x, y }: Point): string {
  return `${x},${y}`
}

/**
 * Hull painting robot driven by a program
 *
 * Each input is the colour under the robot. Outputs come in pairs that the
 * robot tells apart with its own toggle: first the colour to paint the
 * current panel, then a turn (0 left, 1 right) followed by one step forward.
 * The robot starts facing up.
 */
export class PaintingRobot implements IOCapability {
  private readonly panels = new Map<string, Panel>()
  private readonly painted = new Set<string>()
  private current: Point = { x: 0, y: 0 }
  private headingIndex = 0
  private expecting: 'paint' | 'turn' = 'paint'

  constructor(options: PaintingRobotOptions = {}) {
    if (options.startColor !== undefined) {
      this.panels.set(keyOf(this.current), {
        ...this.current,
        color: options.startColor,
      })
    }
  }

  get position(): Point {
    return { ...this.current }
  }

  get direction(): Point {
    return { ...HEADINGS[this.headingIndex] }
  }

  /**
   * Number of distinct panels painted at least once
   */
  get paintedPanelCount(): number {
    return this.painted.size
  }

  colorAt(point: Point): PanelColor {
    return this.panels.get(keyOf(point))?.color ?? PANEL_COLORS.BLACK
  }

  requestInput(): Safe<Word> {
    return safeResult(this.colorAt(this.current))
  }

  emitOutput(value: Word): Safe<true> {
    if (this.expecting === 'paint') {
      if (!isPanelColor(value)) {
        return safeError(new RobotCommandError(`Invalid panel color ${value}`))
      }
      const key = keyOf(this.current)
      this.panels.set(key, { ...this.current, color: value })
      this.painted.add(key)
      this.expecting = 'turn'
      return safeResult<true>(true)
    }

    if (value === TURN_COMMANDS.LEFT) {
      this.headingIndex = (this.headingIndex + HEADINGS.length - 1) % HEADINGS.length
    } else if (value === TURN_COMMANDS.RIGHT) {
      this.headingIndex = (this.headingIndex + 1) % HEADINGS.length
    } else {
      return safeError(new RobotCommandError(`Invalid turn command ${value}`))
    }
    const heading = HEADINGS[this.headingIndex]
    this.current = {
      x: this.current.x + heading.x,
      y: this.current.y + heading.y,
    }
    this.expecting = 'paint'
    return safeResult<true>(true)
  }

  /**
   * Netpbm P1 image of the bounding box of every known panel
   * (black panels are `1`, white panels `0`)
   */
  render(): string {
    const panels = Array.from(this.panels.values())
    if (panels.length === 0) {
      return 'P1\n0 0\n'
    }

    const xs = panels.map((panel) => panel.x)
    const ys = panels.map((panel) => panel.y)
    const minX = Math.min(...xs)
    const maxX = Math.max(...xs)
    const minY = Math.min(...ys)
    const maxY = Math.max(...ys)

    const rows: string[] = []
    for (let y = minY; y <= maxY; y++) {
      let row = ''
      for (let x = minX; x <= maxX; x++) {
        row += this.colorAt({ x, y }) === PANEL_COLORS.WHITE ? '0' : '1'
      }
      rows.push(row)
    }
    return ['P1', `${maxX - minX + 1} ${maxY - minY + 1}`, ...rows, ''].join(
      '\n',
    )
  }
}
