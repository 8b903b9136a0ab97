// Типы для модели строк G-code

export type MoveKind = 'rapid' | 'linear' | 'home' | 'setPosition'

export type ParamLetter = 'X' | 'Y' | 'Z' | 'A' | 'B' | 'E' | 'F'

export type AxisLetter = 'X' | 'Y' | 'Z' | 'A' | 'B'

// Порядок параметров при вставке новых слов
export const CANONICAL_ORDER: readonly ParamLetter[] = ['X', 'Y', 'Z', 'A', 'B', 'E', 'F']

export const AXIS_LETTERS: readonly AxisLetter[] = ['X', 'Y', 'Z', 'A', 'B']

export interface MoveWord {
  readonly letter: ParamLetter
  readonly value: number
  // Value as written; empty for bare axis flags such as `G28 X`
  readonly text: string
}

export interface Move {
  readonly type: 'move'
  readonly kind: MoveKind
  readonly command: string
  readonly words: readonly MoveWord[]
  readonly comment?: string
  readonly lineNumber: number
  // Present only while the move is untouched
  readonly source?: string
}

export type Directive =
  | 'absolute'
  | 'relative'
  | 'extrusionAbsolute'
  | 'extrusionRelative'

export interface PassThrough {
  readonly type: 'passthrough'
  readonly text: string
  readonly lineNumber: number
  readonly directive?: Directive
}

export type ProgramLine = Move | PassThrough

export interface GCodeParseError {
  line: number
  message: string
  code: string
}

export interface ProgramParseResult {
  lines: ProgramLine[]
  errors: GCodeParseError[]
  lineCount: number
  moveCount: number
}

export type WordChanges = Partial<Record<ParamLetter, number | null>>
