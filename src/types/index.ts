// Общие типы конвейера

// Pipeline states, one-directional
export enum PipelineState {
  Raw = 'raw',
  Bent = 'bent',
  Translated = 'translated',
  Ready = 'ready'
}

export enum PipelineStage {
  Bending = 'bending',
  Translation = 'translation',
  Emission = 'emission'
}

export enum IssueKind {
  BelowPlatform = 'BelowPlatform',
  AngleExceeded = 'AngleExceeded',
  SelfIntersection = 'SelfIntersection',
  ImplausibleMove = 'ImplausibleMove',
  UnreachablePose = 'UnreachablePose'
}

export enum IssueSeverity {
  Warning = 'warning',
  Fatal = 'fatal'
}

export interface ValidationIssue {
  kind: IssueKind;
  layer: number;
  severity: IssueSeverity;
  message: string;
  line?: number;
  height?: number;
}

export interface Pose {
  x: number;
  y: number;
  z: number;
  a: number;
  b: number;
}

// Error types
export enum PipelineErrorCode {
  ParseError = 'PARSE_ERROR',
  StageDependency = 'STAGE_DEPENDENCY',
  FatalValidation = 'FATAL_VALIDATION',
  IOError = 'IO_ERROR',
  InvalidConfig = 'INVALID_CONFIG',
  Cancelled = 'CANCELLED'
}

export interface PipelineErrorDetails {
  path?: string;
  layer?: number;
  line?: number;
  cause?: unknown;
}

export interface IPipelineError extends Error {
  code: PipelineErrorCode;
  details?: PipelineErrorDetails;
}

// Structured failure, what callers get instead of a raw exception
export interface PipelineFailure {
  code: PipelineErrorCode;
  message: string;
  path?: string;
  layer?: number;
  line?: number;
}

// Хуки этапа: отмена и отчёт о найденных проблемах
export interface StageHooks {
  signal?: AbortSignal;
  onIssue?: (issue: ValidationIssue) => void;
  onProgress?: (progress: StageProgress) => void;
}

export interface StageProgress {
  band: number;
  layer: number;
  height: number;
}
