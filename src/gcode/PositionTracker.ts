import { Pose } from '../types'
import { AXIS_LETTERS, AxisLetter, Directive, Move } from './types'
import { wordValue } from './moves'

export const AXIS_KEY: Record<AxisLetter, keyof Pose> = {
  X: 'x',
  Y: 'y',
  Z: 'z',
  A: 'a',
  B: 'b'
}

// Running machine context across a file: absolute pose, last E, modal modes
export class PositionTracker {
  private position: Pose = { x: 0, y: 0, z: 0, a: 0, b: 0 }
  private extrusion: number = 0
  private relativeDistance: boolean = false
  private relativeExtrusion: boolean = false

  get pose(): Pose {
    return { ...this.position }
  }

  get lastExtrusion(): number {
    return this.extrusion
  }

  get isRelativeDistance(): boolean {
    return this.relativeDistance
  }

  get isRelativeExtrusion(): boolean {
    return this.relativeExtrusion
  }

  applyDirective(directive: Directive): void {
    switch (directive) {
      case 'absolute':
        this.relativeDistance = false
        break
      case 'relative':
        this.relativeDistance = true
        break
      case 'extrusionAbsolute':
        this.relativeExtrusion = false
        break
      case 'extrusionRelative':
        this.relativeExtrusion = true
        break
    }
  }

  // Pose after an absolute move; the move must already be normalized
  apply(move: Move): Pose {
    switch (move.kind) {
      case 'rapid':
      case 'linear':
        this.assignAxes(move)
        if (!this.relativeExtrusion) {
          this.extrusion = wordValue(move, 'E') ?? this.extrusion
        }
        break
      case 'home': {
        const axes = AXIS_LETTERS.filter(letter => wordValue(move, letter) !== undefined)
        const homed = axes.length > 0 ? axes : AXIS_LETTERS
        for (const letter of homed) {
          this.position[AXIS_KEY[letter]] = 0
        }
        break
      }
      case 'setPosition':
        this.assignAxes(move)
        this.extrusion = wordValue(move, 'E') ?? this.extrusion
        break
    }
    return this.pose
  }

  private assignAxes(move: Move): void {
    for (const letter of AXIS_LETTERS) {
      const value = wordValue(move, letter)
      if (value !== undefined) {
        this.position[AXIS_KEY[letter]] = value
      }
    }
  }
}
