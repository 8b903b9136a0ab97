import { GCodeLineModel } from '../gcode/GCodeLineModel';
import { findWord, isMotion, updateMove } from '../gcode/moves';
import { ProgramLine } from '../gcode/types';

export interface EmitterParams {
  // Controller command keyword, e.g. MANUAL_STEPPER
  command: string;
  stepper: string;
}

export const DEFAULT_EMITTER_PARAMS: EmitterParams = {
  command: 'MANUAL_STEPPER',
  stepper: 'b_stepper',
};

export class ControllerEmitter {
  constructor(private readonly lineModel: GCodeLineModel = new GCodeLineModel()) {}

  actuation(params: EmitterParams, angle: string): string {
    return `${params.command} STEPPER=${params.stepper} MOVE=${angle}`;
  }

  /**
   * Realizes the B timeline as actuation commands placed right before the
   * motion that needs them, skipping repeats of the last emitted angle, and
   * strips A/B from the motion lines.
   */
  emit(lines: readonly ProgramLine[], params: EmitterParams = DEFAULT_EMITTER_PARAMS): string {
    const output: string[] = [];
    let lastB: number | undefined;

    const out = (line: ProgramLine) => {
      output.push(this.lineModel.renderProgram([line]));
    };

    for (const line of lines) {
      if (line.type === 'passthrough' || !isMotion(line)) {
        out(line);
        continue;
      }

      const b = findWord(line, 'B');
      if (b && b.value !== lastB) {
        output.push(this.actuation(params, b.text));
        lastB = b.value;
      }

      const stripped = updateMove(line, { A: null, B: null });
      // Ход только по A/B полностью реализован командой шагового двигателя
      if (stripped.words.length === 0 && stripped.comment === undefined && stripped !== line) {
        continue;
      }
      out(stripped);
    }

    return output.join('\n');
  }
}
