import EventEmitter from 'eventemitter3'
import fs from 'fs/promises'
import { parsePipelineParams, PipelineParams } from '../config/schema'
import { CurveSample, SplineCurve } from '../bending/SplineCurve'
import { SplineBendEngine } from '../bending/SplineBendEngine'
import { KinematicsTranslator } from '../kinematics/KinematicsTranslator'
import { ControllerEmitter } from '../emitter/ControllerEmitter'
import { GCodeLineModel } from '../gcode/GCodeLineModel'
import {
  IssueSeverity,
  PipelineErrorCode,
  PipelineStage,
  PipelineState,
  StageHooks,
  ValidationIssue
} from '../types'
import { ErrorHandler } from '../utils/error-handler'
import { Logger } from '../utils/logger'
import { artifactPaths, readStageHeader, replaceStageHeader } from './artifacts'
import {
  PipelineEvents,
  PipelineRunContext,
  StageResult,
  StageRunOptions
} from './types'

interface StageDefinition {
  requires: PipelineState
  produces: PipelineState
  // Which stage produced the prerequisite; null for the raw input
  after: PipelineStage | null
}

// Raw -> Bent -> Translated -> Ready, без циклов
const STAGES: Record<PipelineStage, StageDefinition> = {
  [PipelineStage.Bending]: {
    requires: PipelineState.Raw,
    produces: PipelineState.Bent,
    after: null
  },
  [PipelineStage.Translation]: {
    requires: PipelineState.Bent,
    produces: PipelineState.Translated,
    after: PipelineStage.Bending
  },
  [PipelineStage.Emission]: {
    requires: PipelineState.Translated,
    produces: PipelineState.Ready,
    after: PipelineStage.Translation
  }
}

const STAGE_ORDER: readonly PipelineStage[] = [
  PipelineStage.Bending,
  PipelineStage.Translation,
  PipelineStage.Emission
]

interface StageOutcome {
  text: string
  issues: ValidationIssue[]
}

function generateRunId(): string {
  return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`
}

export function createRunContext(inputPath: string, params?: unknown): PipelineRunContext {
  const validated = parsePipelineParams(params)
  return Object.freeze({
    runId: generateRunId(),
    inputPath,
    params: Object.freeze(validated),
    artifacts: Object.freeze(artifactPaths(inputPath))
  })
}

export function curveFromParams(params: PipelineParams): SplineCurve {
  return new SplineCurve({
    x: params.splineX,
    z: params.splineZ,
    startSlope: params.startSlope,
    endSlope: params.endSlope
  })
}

export class PipelineOrchestrator extends EventEmitter<PipelineEvents> {
  private logger = new Logger('Pipeline')
  private bendEngine = new SplineBendEngine()
  private translator = new KinematicsTranslator()

  async runBending(context: PipelineRunContext, options: StageRunOptions = {}): Promise<StageResult> {
    return this.runStage(context, PipelineStage.Bending, options, async (text, hooks) => {
      const lineModel = new GCodeLineModel()
      const parsed = lineModel.parseProgram(text)
      const curve = curveFromParams(context.params)
      const result = await this.bendEngine.bend(parsed.lines, curve, context.params, hooks)
      return { text: lineModel.renderProgram(result.lines), issues: result.issues }
    })
  }

  async runTranslation(context: PipelineRunContext, options: StageRunOptions = {}): Promise<StageResult> {
    return this.runStage(context, PipelineStage.Translation, options, async (text, hooks) => {
      const lineModel = new GCodeLineModel()
      const parsed = lineModel.parseProgram(text)
      const result = await this.translator.translate(parsed.lines, context.params, hooks)
      return { text: lineModel.renderProgram(result.lines), issues: result.issues }
    })
  }

  async runEmission(context: PipelineRunContext, options: StageRunOptions = {}): Promise<StageResult> {
    return this.runStage(context, PipelineStage.Emission, options, async text => {
      const lineModel = new GCodeLineModel()
      const parsed = lineModel.parseProgram(text)
      const emitter = new ControllerEmitter(lineModel)
      const output = emitter.emit(parsed.lines, {
        command: context.params.actuationCommand,
        stepper: context.params.stepper
      })
      return { text: output, issues: [] }
    })
  }

  // Все три этапа подряд, остановка на первой ошибке
  async runAll(context: PipelineRunContext, options: StageRunOptions = {}): Promise<StageResult[]> {
    const results: StageResult[] = []
    for (const stage of STAGE_ORDER) {
      const result =
        stage === PipelineStage.Bending
          ? await this.runBending(context, options)
          : stage === PipelineStage.Translation
            ? await this.runTranslation(context, options)
            : await this.runEmission(context, options)
      results.push(result)
      if (!result.success) break
    }
    return results
  }

  // Furthest state whose artifact exists and carries the right header
  async getState(context: PipelineRunContext): Promise<PipelineState> {
    for (const stage of [...STAGE_ORDER].reverse()) {
      const expected = STAGES[stage].produces
      const text = await this.readIfExists(context.artifacts[stage])
      if (text !== null && readStageHeader(text) === expected) {
        return expected
      }
    }
    return PipelineState.Raw
  }

  // Pure: no file I/O, no events
  previewCurve(curve: SplineCurve, step: number = 1): CurveSample[] {
    return curve.sample(step)
  }

  private async runStage(
    context: PipelineRunContext,
    stage: PipelineStage,
    options: StageRunOptions,
    work: (text: string, hooks: StageHooks) => Promise<StageOutcome>
  ): Promise<StageResult> {
    const startTime = Date.now()
    const definition = STAGES[stage]
    const outputPath = context.artifacts[stage]
    const sourcePath = definition.after ? context.artifacts[definition.after] : context.inputPath
    const issues: ValidationIssue[] = []
    let tempPath: string | null = null

    const finish = (success: boolean, error?: unknown): StageResult => ({
      success,
      runId: context.runId,
      stage,
      state: success ? definition.produces : definition.requires,
      sourcePath,
      outputPath,
      issues,
      failure: error === undefined ? undefined : ErrorHandler.toFailure(error),
      duration: Date.now() - startTime
    })

    const hooks: StageHooks = {
      signal: options.signal,
      onIssue: issue => this.emit('issue', { runId: context.runId, stage, issue }),
      onProgress: progress => this.emit('progress', { runId: context.runId, stage, progress })
    }

    this.emit('stageStarted', { runId: context.runId, stage })
    this.logger.info(`${stage}: ${sourcePath} -> ${outputPath}`)

    try {
      ErrorHandler.throwIfAborted(options.signal, stage)
      const sourceText = await this.readPrerequisite(sourcePath, definition)

      const outcome = await work(sourceText, hooks)
      issues.push(...outcome.issues)

      const fatal = outcome.issues.find(issue => issue.severity === IssueSeverity.Fatal)
      if (fatal) {
        throw ErrorHandler.createError(
          PipelineErrorCode.FatalValidation,
          `${stage} stopped: ${fatal.message}`,
          { layer: fatal.layer, line: fatal.line }
        )
      }

      ErrorHandler.throwIfAborted(options.signal, stage)
      tempPath = `${outputPath}.${context.runId}.tmp`
      try {
        await fs.writeFile(tempPath, replaceStageHeader(outcome.text, definition.produces), 'utf-8')
        ErrorHandler.throwIfAborted(options.signal, stage)
        await fs.rename(tempPath, outputPath)
      } catch (error) {
        if (ErrorHandler.isPipelineError(error)) throw error
        throw ErrorHandler.fromFsError(error, outputPath)
      }
      tempPath = null

      const result = finish(true)
      const warnings = issues.length > 0 ? ` with ${issues.length} warning(s)` : ''
      this.logger.success(`${stage} finished${warnings}: ${outputPath}`)
      this.emit('stageCompleted', result)
      return result
    } catch (error) {
      const result = finish(false, error)
      this.logger.error(`${stage} failed: ${result.failure?.message}`)
      this.emit('stageFailed', result)
      return result
    } finally {
      if (tempPath) {
        await this.discard(tempPath)
      }
    }
  }

  private async readPrerequisite(sourcePath: string, definition: StageDefinition): Promise<string> {
    const text = await this.readIfExists(sourcePath)

    if (definition.after === null) {
      if (text === null) {
        throw ErrorHandler.createError(PipelineErrorCode.IOError, `Input file not found: ${sourcePath}`, {
          path: sourcePath
        })
      }
      return text
    }

    if (text === null) {
      throw ErrorHandler.createError(
        PipelineErrorCode.StageDependency,
        `Missing ${definition.requires} artifact ${sourcePath}, run ${definition.after} first`,
        { path: sourcePath }
      )
    }
    if (readStageHeader(text) !== definition.requires) {
      throw ErrorHandler.createError(
        PipelineErrorCode.StageDependency,
        `${sourcePath} was not produced by ${definition.after}`,
        { path: sourcePath }
      )
    }
    return text
  }

  private async readIfExists(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null
      }
      throw ErrorHandler.fromFsError(error, filePath)
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true })
    } catch (error) {
      this.logger.warn(`Could not remove temporary file ${tempPath}`, error)
    }
  }
}
