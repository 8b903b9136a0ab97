import {
  CANONICAL_ORDER,
  Move,
  MoveWord,
  ParamLetter,
  ProgramLine,
  WordChanges
} from './types'

// Знаков после запятой для каждого параметра
export const PRECISION: Record<ParamLetter, number> = {
  X: 5,
  Y: 5,
  Z: 3,
  A: 3,
  B: 3,
  E: 5,
  F: 0
}

// Fixed-point, trailing zeros trimmed, never scientific notation
export function formatNumber(value: number, decimals: number): string {
  const fixed = value.toFixed(decimals)
  const trimmed = decimals > 0 ? fixed.replace(/\.?0+$/, '') : fixed
  return trimmed === '-0' ? '0' : trimmed
}

export function formatWord(letter: ParamLetter, value: number): MoveWord {
  return { letter, value, text: formatNumber(value, PRECISION[letter]) }
}

export function isMove(line: ProgramLine): line is Move {
  return line.type === 'move'
}

// G0/G1
export function isMotion(move: Move): boolean {
  return move.kind === 'rapid' || move.kind === 'linear'
}

export function findWord(move: Move, letter: ParamLetter): MoveWord | undefined {
  return move.words.find(word => word.letter === letter)
}

export function wordValue(move: Move, letter: ParamLetter): number | undefined {
  return findWord(move, letter)?.value
}

export function hasLinearAxes(move: Move): boolean {
  return move.words.some(word => word.letter === 'X' || word.letter === 'Y' || word.letter === 'Z')
}

// Положительная подача: ход печатает, а не перемещается
export function extrudes(move: Move, lastExtrusion: number, relativeExtrusion: boolean): boolean {
  const e = wordValue(move, 'E')
  if (e === undefined) return false
  return relativeExtrusion ? e > 0 : e > lastExtrusion
}

/**
 * Returns a new Move with the given words replaced, added (null removes).
 * Words keep their order; new ones go in canonical X Y Z A B E F order.
 * A word whose value does not change keeps its original text, and a move
 * with no effective change is returned as is, source included.
 */
export function updateMove(move: Move, changes: WordChanges): Move {
  let changed = false
  const words: MoveWord[] = []

  for (const word of move.words) {
    const next = changes[word.letter]
    if (next === undefined) {
      words.push(word)
    } else if (next === null) {
      changed = true
    } else if (next === word.value) {
      words.push(word)
    } else {
      words.push(formatWord(word.letter, next))
      changed = true
    }
  }

  for (const letter of CANONICAL_ORDER) {
    const next = changes[letter]
    if (next === null || next === undefined || move.words.some(word => word.letter === letter)) {
      continue
    }
    const rank = CANONICAL_ORDER.indexOf(letter)
    const before = words.findIndex(word => CANONICAL_ORDER.indexOf(word.letter) > rank)
    const word = formatWord(letter, next)
    if (before === -1) {
      words.push(word)
    } else {
      words.splice(before, 0, word)
    }
    changed = true
  }

  if (!changed) return move

  return {
    type: 'move',
    kind: move.kind,
    command: move.command,
    words,
    comment: move.comment,
    lineNumber: move.lineNumber
  }
}
