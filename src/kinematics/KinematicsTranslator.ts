import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { LayerTracker } from '../bending/LayerTracker';
import { PositionTracker } from '../gcode/PositionTracker';
import { extrudes, hasLinearAxes, isMotion, updateMove } from '../gcode/moves';
import { Move, ProgramLine } from '../gcode/types';
import { IssueKind, IssueSeverity, Pose, StageHooks, ValidationIssue } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export type AngleRange = readonly [number, number];

export interface JointLimits {
  a: AngleRange;
  b: AngleRange;
}

export interface KinematicsParams {
  la: number; // mm
  lb: number; // mm
  jointLimits: JointLimits;
  // Only used to reference issues by layer
  layerHeight: number;
}

export interface Offset3 {
  x: number;
  y: number;
  z: number;
}

export interface TranslateResult {
  lines: ProgramLine[];
  issues: ValidationIssue[];
  translation: Offset3;
  fatal: boolean;
}

const DEG_TO_RAD = Math.PI / 180;

/**
 * Tip offset of the two-link head relative to the carriage for joint angles
 * A and B (degrees). Zero for A = B = 0.
 */
export function forwardKinematics(a: number, b: number, la: number, lb: number): Offset3 {
  const sinA = Math.sin(a * DEG_TO_RAD);
  const cosA = Math.cos(a * DEG_TO_RAD);
  const sinB = Math.sin(b * DEG_TO_RAD);
  const cosB = Math.cos(b * DEG_TO_RAD);

  return {
    x: sinA * la + cosA * sinB * lb,
    y: cosA * la - la - sinA * sinB * lb,
    z: cosB * lb - lb,
  };
}

function withinRange(value: number, [min, max]: AngleRange): boolean {
  return value >= min && value <= max;
}

interface PlannedMove {
  index: number;
  move: Move;
  physical: Offset3;
}

export class KinematicsTranslator {
  private logger = new Logger('KinematicsTranslator');

  async translate(
    lines: readonly ProgramLine[],
    params: KinematicsParams,
    hooks: StageHooks = {}
  ): Promise<TranslateResult> {
    const tracker = new PositionTracker();
    const layers = new LayerTracker(params.layerHeight);
    const planned: PlannedMove[] = [];
    const min: Offset3 = { x: Infinity, y: Infinity, z: Infinity };

    // 1. Forward kinematics for every positioned move
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      if (line.type === 'passthrough') {
        if (line.directive) tracker.applyDirective(line.directive);
        continue;
      }

      const printing = extrudes(line, tracker.lastExtrusion, tracker.isRelativeExtrusion);
      const pose = tracker.apply(line);
      if (!isMotion(line) || !hasLinearAxes(line)) continue;

      const location = layers.locate(pose.z, printing);
      if (location.entered) {
        ErrorHandler.throwIfAborted(hooks.signal, 'Translation');
        hooks.onProgress?.({
          band: layers.count,
          layer: location.band.index,
          height: location.band.height,
        });
        await yieldToEventLoop();
        ErrorHandler.throwIfAborted(hooks.signal, 'Translation');
      }

      const offset = this.reach(pose, params);
      if (!offset) {
        const issue: ValidationIssue = {
          kind: IssueKind.UnreachablePose,
          layer: location.band.index,
          severity: IssueSeverity.Fatal,
          message: `Pose A=${pose.a} B=${pose.b} is unreachable for the linkage`,
          line: line.lineNumber,
          height: pose.z,
        };
        this.logger.error(`Layer ${issue.layer}, line ${line.lineNumber}: ${issue.message}`);
        hooks.onIssue?.(issue);
        return {
          lines: [...lines],
          issues: [issue],
          translation: { x: 0, y: 0, z: 0 },
          fatal: true,
        };
      }

      const physical: Offset3 = {
        x: pose.x + offset.x,
        y: pose.y + offset.y,
        z: pose.z + offset.z,
      };
      min.x = Math.min(min.x, physical.x);
      min.y = Math.min(min.y, physical.y);
      min.z = Math.min(min.z, physical.z);
      planned.push({ index, move: line, physical });
    }

    // 2. One workspace translation for the whole file
    const translation: Offset3 = {
      x: planned.length > 0 ? Math.max(0, -min.x) : 0,
      y: planned.length > 0 ? Math.max(0, -min.y) : 0,
      z: planned.length > 0 ? Math.max(0, -min.z) : 0,
    };
    if (translation.x > 0 || translation.y > 0 || translation.z > 0) {
      this.logger.info(
        `Workspace shifted by X${translation.x.toFixed(3)} Y${translation.y.toFixed(3)} Z${translation.z.toFixed(3)}`
      );
    }

    const output = [...lines];
    for (const { index, move, physical } of planned) {
      output[index] = updateMove(move, {
        X: physical.x + translation.x,
        Y: physical.y + translation.y,
        Z: physical.z + translation.z,
      });
    }

    return { lines: output, issues: [], translation, fatal: false };
  }

  // null when no finite solution exists for the joint pair
  private reach(pose: Pose, params: KinematicsParams): Offset3 | null {
    if (!Number.isFinite(pose.a) || !Number.isFinite(pose.b)) return null;
    if (!withinRange(pose.a, params.jointLimits.a) || !withinRange(pose.b, params.jointLimits.b)) {
      return null;
    }

    const offset = forwardKinematics(pose.a, pose.b, params.la, params.lb);
    if (!Number.isFinite(offset.x) || !Number.isFinite(offset.y) || !Number.isFinite(offset.z)) {
      return null;
    }
    return offset;
  }
}
