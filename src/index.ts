// Экспорт типов
export * from './types';
export * from './gcode/types';
export * from './pipeline/types';

// Модель строк G-code
export { GCodeLineModel, RELATIVE_MODE_MARKER } from './gcode/GCodeLineModel';
export { PositionTracker } from './gcode/PositionTracker';
export { extrudes, formatNumber, updateMove, wordValue } from './gcode/moves';

// Изгиб
export { SplineCurve, SplineAnchors, CurveSample } from './bending/SplineCurve';
export { ArcLengthMap } from './bending/ArcLengthMap';
export { SplineBendEngine, BendParams, BendResult, LayerFrame } from './bending/SplineBendEngine';

// Кинематика и вывод для контроллера
export {
  KinematicsTranslator,
  KinematicsParams,
  TranslateResult,
  forwardKinematics,
} from './kinematics/KinematicsTranslator';
export { ControllerEmitter, EmitterParams, DEFAULT_EMITTER_PARAMS } from './emitter/ControllerEmitter';

// Конвейер
export { PipelineOrchestrator, createRunContext, curveFromParams } from './pipeline/PipelineOrchestrator';
export { artifactPath, artifactPaths } from './pipeline/artifacts';

// Конфигурация
export { PipelineParams, PipelineParamsSchema, DEFAULT_PARAMS, parsePipelineParams } from './config/schema';
export { loadPipelineParams } from './config/loader';

// Экспорт утилит
export { Logger } from './utils/logger';
export { ErrorHandler } from './utils/error-handler';
