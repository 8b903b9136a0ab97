import { setImmediate as yieldToEventLoop } from 'timers/promises'
import { SplineCurve } from './SplineCurve'
import { LayerTracker } from './LayerTracker'
import { ArcLengthMap } from './ArcLengthMap'
import { PositionTracker } from '../gcode/PositionTracker'
import { extrudes, hasLinearAxes, isMotion, updateMove, wordValue } from '../gcode/moves'
import { ProgramLine } from '../gcode/types'
import { IssueKind, IssueSeverity, Pose, StageHooks, ValidationIssue } from '../types'
import { ErrorHandler } from '../utils/error-handler'
import { Logger } from '../utils/logger'

export interface BendParams {
  layerHeight: number
  warningAngle: number // degrees
  // Evaluate each band at the curve height of equal arc length
  discretizationLength?: number
  // mm between print height and curve height before a band is implausible
  maxHeightDrift?: number
}

export interface LayerFrame {
  index: number
  height: number
  // Height at which the curve was evaluated; equals height without arc-length mapping
  curveHeight: number
  lateralOffset: number
  tangentAngle: number
  // Lowest transformed Z of the band and the line that reached it
  minZ: number
  minZLine: number
  firstLine: number
  moveCount: number
  originalExtrusion: number
  correctedExtrusion: number
  extrusionFactor: number
}

export interface BendResult {
  lines: ProgramLine[]
  issues: ValidationIssue[]
  frames: LayerFrame[]
}

interface Point3 {
  x: number
  y: number
  z: number
}

const OFFSET_EPSILON = 1e-9

export const DEFAULT_MAX_HEIGHT_DRIFT = 50

function distance(from: Point3, to: Point3): number {
  const dx = to.x - from.x
  const dy = to.y - from.y
  const dz = to.z - from.z
  return Math.sqrt(dx * dx + dy * dy + dz * dz)
}

export class SplineBendEngine {
  private logger = new Logger('SplineBendEngine')

  /**
   * Shifts every positioned G0/G1 along the bend axis by the curve offset of
   * its layer band, tilts B to the band's tangent angle and rescales E by the
   * segment length ratio. Deterministic: no clock, no randomness, no I/O.
   * Yields to the event loop once per band so cancellation takes effect.
   */
  async bend(
    lines: readonly ProgramLine[],
    curve: SplineCurve,
    params: BendParams,
    hooks: StageHooks = {}
  ): Promise<BendResult> {
    const tracker = new PositionTracker()
    const layers = new LayerTracker(params.layerHeight)
    const frames = new Map<number, LayerFrame>()
    const output: ProgramLine[] = []
    const arcLengths =
      params.discretizationLength !== undefined
        ? new ArcLengthMap(curve, params.discretizationLength)
        : null

    // Точка вне хода (старт, G28, G92) смещается по собственной высоте
    const offsetPoint = (pose: Pose): Point3 => ({
      x: pose.x + curve.lateralOffsetAt(pose.z),
      y: pose.y,
      z: pose.z
    })

    let previousBent = offsetPoint(tracker.pose)
    let extrusionCorrection = 0
    let warnedOutOfRange = false

    for (const line of lines) {
      if (line.type === 'passthrough') {
        if (line.directive) {
          tracker.applyDirective(line.directive)
        }
        output.push(line)
        continue
      }

      if (!isMotion(line)) {
        tracker.apply(line)
        if (line.kind === 'setPosition' && wordValue(line, 'E') !== undefined) {
          extrusionCorrection = 0
        }
        previousBent = offsetPoint(tracker.pose)
        output.push(line)
        continue
      }

      const before = tracker.pose
      const extrusionBefore = tracker.lastExtrusion
      const extrusion = wordValue(line, 'E')

      if (!hasLinearAxes(line)) {
        tracker.apply(line)
        // Ретракт без перемещения: только перенос накопленной поправки
        if (extrusion !== undefined && !tracker.isRelativeExtrusion) {
          output.push(updateMove(line, { E: extrusion + extrusionCorrection }))
        } else {
          output.push(line)
        }
        continue
      }

      const printing = extrudes(line, extrusionBefore, tracker.isRelativeExtrusion)
      const pose = tracker.apply(line)
      const location = layers.locate(pose.z, printing)
      if (location.entered) {
        ErrorHandler.throwIfAborted(hooks.signal, 'Bending')
        hooks.onProgress?.({ band: layers.count, layer: location.band.index, height: location.band.height })
        await yieldToEventLoop()
        ErrorHandler.throwIfAborted(hooks.signal, 'Bending')
      }

      let frame = frames.get(location.band.index)
      if (!frame) {
        let curveHeight = location.band.height
        if (arcLengths) {
          const mapped = arcLengths.heightAt(location.band.height)
          if (mapped === null) {
            if (!warnedOutOfRange) {
              this.logger.warn(`Spline not defined high enough for Z=${location.band.height}`)
              warnedOutOfRange = true
            }
          } else {
            curveHeight = mapped
          }
        }
        const sample = curve.evaluate(curveHeight)
        if (!warnedOutOfRange && !curve.isDefinedAt(sample.height)) {
          this.logger.warn(`Spline not defined at Z=${sample.height}, extrapolating`)
          warnedOutOfRange = true
        }
        this.logger.debug(
          `Layer ${location.band.index} at Z=${location.band.height}: offset ${sample.lateralOffset.toFixed(5)}, angle ${sample.tangentAngle.toFixed(3)}°`
        )
        frame = {
          index: location.band.index,
          height: location.band.height,
          curveHeight,
          lateralOffset: sample.lateralOffset,
          tangentAngle: sample.tangentAngle,
          minZ: Infinity,
          minZLine: line.lineNumber,
          firstLine: line.lineNumber,
          moveCount: 0,
          originalExtrusion: 0,
          correctedExtrusion: 0,
          extrusionFactor: 1
        }
        frames.set(frame.index, frame)
      }

      const bent: Point3 = { x: pose.x + frame.lateralOffset, y: pose.y, z: pose.z }
      const oldLength = distance(before, pose)
      const newLength = distance(previousBent, bent)
      const ratio = oldLength > 0 ? newLength / oldLength : 1

      let correctedE: number | undefined
      if (extrusion !== undefined) {
        if (tracker.isRelativeExtrusion) {
          correctedE = extrusion * ratio
          frame.originalExtrusion += extrusion
          frame.correctedExtrusion += correctedE
        } else {
          const delta = extrusion - extrusionBefore
          const corrected = delta * ratio
          extrusionCorrection += corrected - delta
          correctedE = extrusion + extrusionCorrection
          frame.originalExtrusion += delta
          frame.correctedExtrusion += corrected
        }
        frame.extrusionFactor =
          frame.originalExtrusion !== 0 ? frame.correctedExtrusion / frame.originalExtrusion : 1
      }

      frame.moveCount++
      if (bent.z < frame.minZ) {
        frame.minZ = bent.z
        frame.minZLine = line.lineNumber
      }

      output.push(
        updateMove(line, {
          X: bent.x,
          Y: bent.y,
          Z: bent.z,
          A: pose.a,
          B: frame.tangentAngle,
          E: correctedE
        })
      )
      previousBent = bent
    }

    const ordered = [...frames.values()].sort((a, b) => a.height - b.height)
    const issues = this.validate(ordered, params, hooks)

    return { lines: output, issues, frames: ordered }
  }

  // Проверки по слоям в порядке высоты; все найденные проблемы собираются
  private validate(
    frames: readonly LayerFrame[],
    params: BendParams,
    hooks: StageHooks
  ): ValidationIssue[] {
    const issues: ValidationIssue[] = []
    const maxDrift = params.maxHeightDrift ?? DEFAULT_MAX_HEIGHT_DRIFT
    const report = (issue: ValidationIssue) => {
      issues.push(issue)
      this.logger.warn(`Layer ${issue.layer}: ${issue.message}`)
      hooks.onIssue?.(issue)
    }

    let direction = 0

    frames.forEach((frame, i) => {
      ErrorHandler.throwIfAborted(hooks.signal, 'Bending validation')

      if (frame.minZ < 0) {
        report({
          kind: IssueKind.BelowPlatform,
          layer: frame.index,
          severity: IssueSeverity.Warning,
          message: `Movement below build platform (Z=${frame.minZ.toFixed(3)})`,
          line: frame.minZLine,
          height: frame.height
        })
      }

      if (Math.abs(frame.tangentAngle) > params.warningAngle) {
        report({
          kind: IssueKind.AngleExceeded,
          layer: frame.index,
          severity: IssueSeverity.Warning,
          message: `Spline angle is ${frame.tangentAngle.toFixed(2)}° (limit ${params.warningAngle}°)`,
          line: frame.firstLine,
          height: frame.height
        })
      }

      const drift = Math.abs(frame.curveHeight - frame.height)
      if (drift > maxDrift) {
        report({
          kind: IssueKind.ImplausibleMove,
          layer: frame.index,
          severity: IssueSeverity.Warning,
          message: `Possibly implausible move: curve evaluated at Z=${frame.curveHeight.toFixed(3)} for print height ${frame.height}`,
          line: frame.firstLine,
          height: frame.height
        })
      }

      if (i === 0) return

      const step = frame.lateralOffset - frames[i - 1].lateralOffset
      const sign = step > OFFSET_EPSILON ? 1 : step < -OFFSET_EPSILON ? -1 : 0
      if (sign === 0) return

      if (direction !== 0 && sign !== direction) {
        report({
          kind: IssueKind.SelfIntersection,
          layer: frame.index,
          severity: IssueSeverity.Warning,
          message: `Self intersection: lateral offset reverses direction at Z=${frame.height}`,
          line: frame.firstLine,
          height: frame.height
        })
      }
      direction = sign
    })

    return issues
  }
}
