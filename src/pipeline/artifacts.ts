import path from 'path'
import { PipelineStage, PipelineState } from '../types'

export const STAGE_PREFIX: Record<PipelineStage, string> = {
  [PipelineStage.Bending]: 'BENT',
  [PipelineStage.Translation]: 'IK',
  [PipelineStage.Emission]: 'KLIPPER'
}

const HEADER_PREFIX = '; bendkit stage='

const STATES = new Set<string>(Object.values(PipelineState))

function isPipelineState(value: string): value is PipelineState {
  return STATES.has(value)
}

// model.gcode -> BENT_model.gcode, рядом с исходным файлом
export function artifactPath(inputPath: string, stage: PipelineStage): string {
  return path.join(path.dirname(inputPath), `${STAGE_PREFIX[stage]}_${path.basename(inputPath)}`)
}

export function artifactPaths(inputPath: string): Record<PipelineStage, string> {
  return {
    [PipelineStage.Bending]: artifactPath(inputPath, PipelineStage.Bending),
    [PipelineStage.Translation]: artifactPath(inputPath, PipelineStage.Translation),
    [PipelineStage.Emission]: artifactPath(inputPath, PipelineStage.Emission)
  }
}

export function stageHeader(state: PipelineState): string {
  return `${HEADER_PREFIX}${state}`
}

export function readStageHeader(text: string): PipelineState | null {
  const firstLine = text.split(/\r?\n/, 1)[0]
  if (!firstLine.startsWith(HEADER_PREFIX)) return null
  const state = firstLine.substring(HEADER_PREFIX.length).trim()
  return isPipelineState(state) ? state : null
}

// The previous stage's header line is replaced so line numbers stay aligned
export function replaceStageHeader(text: string, state: PipelineState): string {
  if (readStageHeader(text) === null) {
    return `${stageHeader(state)}\n${text}`
  }
  const newline = text.indexOf('\n')
  return newline === -1 ? stageHeader(state) : `${stageHeader(state)}${text.substring(newline)}`
}
