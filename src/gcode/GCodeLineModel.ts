import {
  Directive,
  GCodeParseError,
  Move,
  MoveKind,
  MoveWord,
  ParamLetter,
  PassThrough,
  ProgramLine,
  ProgramParseResult,
  WordChanges
} from './types'
import { AXIS_KEY, PositionTracker } from './PositionTracker'
import { isMove, updateMove } from './moves'
import { Logger } from '../utils/logger'
import { ErrorHandler } from '../utils/error-handler'
import { PipelineErrorCode } from '../types'

const COMMAND_KINDS: Record<string, MoveKind> = {
  G0: 'rapid',
  G1: 'linear',
  G28: 'home',
  G92: 'setPosition'
}

const DIRECTIVES: Record<string, Directive> = {
  G90: 'absolute',
  G91: 'relative',
  M82: 'extrusionAbsolute',
  M83: 'extrusionRelative'
}

const PARAM_LETTERS = new Set<string>(['X', 'Y', 'Z', 'A', 'B', 'E', 'F'])

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)$/

export const RELATIVE_MODE_MARKER = '; G91 normalized to absolute coordinates'

function isParamLetter(letter: string): letter is ParamLetter {
  return PARAM_LETTERS.has(letter)
}

// G00 и G01 приводим к G0 и G1
function normalizeCommand(token: string): string {
  const match = /^([GM])0*(\d+)$/.exec(token.toUpperCase())
  return match ? `${match[1]}${match[2]}` : token.toUpperCase()
}

export class GCodeLineModel {
  private lineNumber: number = 0
  private errors: GCodeParseError[] = []
  private tracker = new PositionTracker()
  private logger = new Logger('GCodeLineModel')

  reset(): void {
    this.lineNumber = 0
    this.errors = []
    this.tracker = new PositionTracker()
  }

  // Разбор всей программы с учётом модального контекста
  parseProgram(text: string): ProgramParseResult {
    this.reset()

    const source = text.split(/\r?\n/)
    const lines = source.map(line => this.parse(line))

    return {
      lines,
      errors: [...this.errors],
      lineCount: source.length,
      moveCount: lines.filter(isMove).length
    }
  }

  /**
   * Parses one line in the running context of the lines parsed before it.
   * Relative motion comes back normalized to absolute coordinates.
   */
  parse(line: string): ProgramLine {
    this.lineNumber++

    const semicolon = line.indexOf(';')
    const code = (semicolon === -1 ? line : line.substring(0, semicolon)).trim()
    if (!code) {
      return this.passThrough(line)
    }

    const tokens = code.split(/\s+/)
    const head = normalizeCommand(tokens[0])

    const directive = DIRECTIVES[head]
    if (directive) {
      this.tracker.applyDirective(directive)
      return this.passThrough(line, directive)
    }

    const kind = COMMAND_KINDS[head]
    if (!kind) {
      return this.passThrough(line)
    }

    let words: MoveWord[]
    try {
      words = this.parseWords(tokens.slice(1), kind)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.errors.push({ line: this.lineNumber, message, code: line })
      this.logger.warn(`Line ${this.lineNumber}: ${message}, kept as is`)
      return this.passThrough(line)
    }

    const parsed: Move = {
      type: 'move',
      kind,
      command: tokens[0],
      words,
      comment: semicolon === -1 ? undefined : line.substring(semicolon),
      lineNumber: this.lineNumber,
      source: line
    }

    const move = this.tracker.isRelativeDistance ? this.toAbsolute(parsed) : parsed
    this.tracker.apply(move)
    return move
  }

  serialize(line: ProgramLine): string {
    if (line.type === 'passthrough') {
      return line.text
    }
    if (line.source !== undefined) {
      return line.source
    }

    const parts = [line.command, ...line.words.map(word => `${word.letter}${word.text}`)]
    if (line.comment !== undefined) {
      parts.push(line.comment)
    }
    return parts.join(' ')
  }

  // G91 becomes a no-op marker: every coordinate after it is already absolute
  renderProgram(lines: readonly ProgramLine[]): string {
    return lines
      .map(line =>
        line.type === 'passthrough' && line.directive === 'relative'
          ? RELATIVE_MODE_MARKER
          : this.serialize(line)
      )
      .join('\n')
  }

  private parseWords(tokens: string[], kind: MoveKind): MoveWord[] {
    const words: MoveWord[] = []

    for (const token of tokens) {
      const letter = token[0].toUpperCase()
      const text = token.substring(1)

      if (!isParamLetter(letter)) {
        throw this.parseError(`Unknown parameter ${token}`)
      }
      if (words.some(word => word.letter === letter)) {
        throw this.parseError(`Duplicate parameter ${letter}`)
      }

      if (text === '') {
        // G28 X Y: оси без значений
        if (kind !== 'home') {
          throw this.parseError(`Missing value for ${letter}`)
        }
        words.push({ letter, value: 0, text })
        continue
      }

      if (!NUMBER_PATTERN.test(text)) {
        throw this.parseError(`Invalid number ${token}`)
      }
      words.push({ letter, value: parseFloat(text), text })
    }

    return words
  }

  private toAbsolute(move: Move): Move {
    if (move.kind !== 'rapid' && move.kind !== 'linear') {
      return move
    }

    const pose = this.tracker.pose
    const changes: WordChanges = {}
    for (const word of move.words) {
      if (word.letter === 'F') continue
      if (word.letter === 'E') {
        if (!this.tracker.isRelativeExtrusion) {
          changes.E = this.tracker.lastExtrusion + word.value
        }
        continue
      }
      changes[word.letter] = pose[AXIS_KEY[word.letter]] + word.value
    }
    return updateMove(move, changes)
  }

  private parseError(message: string): Error {
    return ErrorHandler.createError(PipelineErrorCode.ParseError, message, { line: this.lineNumber })
  }

  private passThrough(text: string, directive?: Directive): PassThrough {
    return directive
      ? { type: 'passthrough', text, lineNumber: this.lineNumber, directive }
      : { type: 'passthrough', text, lineNumber: this.lineNumber }
  }
}
