import { PipelineParams } from '../config/schema'
import {
  PipelineFailure,
  PipelineStage,
  PipelineState,
  StageProgress,
  ValidationIssue
} from '../types'

// Контекст одного запуска конвейера, неизменяемый
export interface PipelineRunContext {
  readonly runId: string
  readonly inputPath: string
  readonly params: Readonly<PipelineParams>
  readonly artifacts: Readonly<Record<PipelineStage, string>>
}

export interface StageRunOptions {
  signal?: AbortSignal
}

export interface StageResult {
  success: boolean
  runId: string
  stage: PipelineStage
  // State of the file after the run
  state: PipelineState
  sourcePath: string
  outputPath: string
  issues: ValidationIssue[]
  failure?: PipelineFailure
  duration: number // мс
}

export interface StageEvent {
  runId: string
  stage: PipelineStage
}

export interface PipelineEvents {
  stageStarted: (event: StageEvent) => void
  progress: (event: StageEvent & { progress: StageProgress }) => void
  issue: (event: StageEvent & { issue: ValidationIssue }) => void
  stageCompleted: (result: StageResult) => void
  stageFailed: (result: StageResult) => void
}
