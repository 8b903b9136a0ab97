import { GCodeLineModel, RELATIVE_MODE_MARKER } from './GCodeLineModel';
import { findWord, formatNumber, updateMove } from './moves';
import { Move, ProgramLine } from './types';
import { GCODE_FIXTURES } from '../../tests/fixtures/gcode-fixtures';

function asMove(line: ProgramLine): Move {
  if (line.type !== 'move') {
    throw new Error(`Expected a move, got "${line.text}"`);
  }
  return line;
}

describe('GCodeLineModel', () => {
  let model: GCodeLineModel;

  beforeEach(() => {
    model = new GCodeLineModel();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should parse a linear move into words', () => {
    const move = asMove(model.parse('G1 X10.5 Y-2 E.4 F1800 ; perimeter'));

    expect(move.kind).toBe('linear');
    expect(move.words.map(word => word.letter)).toEqual(['X', 'Y', 'E', 'F']);
    expect(move.words.map(word => word.value)).toEqual([10.5, -2, 0.4, 1800]);
    expect(move.comment).toBe('; perimeter');
    expect(move.lineNumber).toBe(1);
  });

  test('should recognize zero-padded commands', () => {
    expect(asMove(model.parse('G00 X1')).kind).toBe('rapid');
    expect(asMove(model.parse('G01 X2')).kind).toBe('linear');
  });

  test('should keep unknown lines verbatim', () => {
    for (const line of GCODE_FIXTURES.passThrough) {
      expect(model.serialize(model.parse(line))).toBe(line);
    }
  });

  test('should serialize an untouched move byte for byte', () => {
    const line = 'G1  X10.500 Y2   E0.10 ; wall';
    expect(model.serialize(model.parse(line))).toBe(line);
  });

  test('should keep bare axes on G28', () => {
    const move = asMove(model.parse('G28 X Y'));

    expect(move.kind).toBe('home');
    expect(model.serialize(move)).toBe('G28 X Y');
  });

  test('should report malformed lines and keep them as pass-through', () => {
    const result = model.parseProgram(GCODE_FIXTURES.invalid);

    expect(result.lineCount).toBe(4);
    expect(result.moveCount).toBe(1);
    expect(result.errors).toEqual([
      { line: 2, message: 'Invalid number Xabc', code: 'G1 Xabc Y10' },
      { line: 3, message: 'Unknown parameter S100', code: 'G1 X10 S100' },
      { line: 4, message: 'Duplicate parameter X', code: 'G1 X10 X20' },
    ]);
    expect(result.lines[1]).toEqual({ type: 'passthrough', text: 'G1 Xabc Y10', lineNumber: 2 });
    expect(model.renderProgram(result.lines)).toBe(GCODE_FIXTURES.invalid);
  });

  test('should normalize relative moves to absolute coordinates', () => {
    const result = model.parseProgram(GCODE_FIXTURES.relative);

    expect(model.renderProgram(result.lines).split('\n')).toEqual([
      'G1 X10 Y10 Z1',
      RELATIVE_MODE_MARKER,
      'G1 X15 Z1.5',
      'G90',
      'G1 X0',
    ]);
  });

  test('should accumulate absolute extrusion under G91', () => {
    const result = model.parseProgram('M82\nG1 X0 E5\nG91\nG1 X1 E2');

    expect(model.serialize(result.lines[3])).toBe('G1 X1 E7');
  });

  test('should leave relative extrusion as written', () => {
    const result = model.parseProgram('M83\nG91\nG1 X1 E2');

    expect(model.serialize(result.lines[2])).toBe('G1 X1 E2');
  });

  test('should normalize CRLF line endings', () => {
    const result = model.parseProgram('G1 X1\r\nG1 X2\r\n');

    expect(result.lineCount).toBe(3);
    expect(model.renderProgram(result.lines)).toBe('G1 X1\nG1 X2\n');
  });

  test('should restart numbering on every program', () => {
    model.parseProgram('G1 X1\nG1 Xbad');
    const result = model.parseProgram('G1 X1');

    expect(result.errors).toHaveLength(0);
    expect(asMove(result.lines[0]).lineNumber).toBe(1);
  });
});

describe('updateMove', () => {
  const model = new GCodeLineModel();

  test('should replace, insert and keep words in order', () => {
    const move = asMove(model.parse('G1 X10 Y20 E0.5 ; wall'));
    const updated = updateMove(move, { X: 12.5, B: 3 });

    expect(model.serialize(updated)).toBe('G1 X12.5 Y20 B3 E0.5 ; wall');
    expect(updated.source).toBeUndefined();
  });

  test('should return the same move when nothing changes', () => {
    const move = asMove(model.parse('G1 X10.0 Y20'));
    const updated = updateMove(move, { X: 10, Z: undefined });

    expect(updated).toBe(move);
    expect(findWord(updated, 'X')?.text).toBe('10.0');
  });

  test('should remove words set to null', () => {
    const move = asMove(model.parse('G1 X1 A0 B5 E0.4'));

    expect(model.serialize(updateMove(move, { A: null, B: null }))).toBe('G1 X1 E0.4');
  });
});

describe('formatNumber', () => {
  test('should trim trailing zeros', () => {
    expect(formatNumber(12.5, 3)).toBe('12.5');
    expect(formatNumber(1.0000001, 5)).toBe('1');
    expect(formatNumber(10.058749999, 5)).toBe('10.05875');
  });

  test('should never print negative zero', () => {
    expect(formatNumber(-0.0000001, 5)).toBe('0');
    expect(formatNumber(-0, 3)).toBe('0');
  });

  test('should keep integers without a decimal point', () => {
    expect(formatNumber(1234567.891, 0)).toBe('1234568');
    expect(formatNumber(1200, 0)).toBe('1200');
  });
});
