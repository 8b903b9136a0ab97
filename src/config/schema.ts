import { z } from 'zod';
import { PipelineErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';

const finite = z.number().finite();

const RangeSchema = z
  .tuple([finite, finite])
  .refine(([min, max]) => min <= max, { message: 'range start must not exceed its end' });

export const JointLimitsSchema = z
  .object({
    a: RangeSchema.default([-180, 180]),
    b: RangeSchema.default([-135, 135]),
  })
  .strict();

export const PipelineParamsSchema = z
  .object({
    // SPLINE_X / SPLINE_Z
    splineX: z.tuple([finite, finite]).default([115.5, 205.5]),
    splineZ: z
      .tuple([finite, finite])
      .refine(([start, end]) => end > start, { message: 'splineZ end must be above its start' })
      .default([0, 100]),
    startSlope: finite.default(0),
    endSlope: finite.default(2.5),
    layerHeight: finite.positive().default(0.28),
    // Arc-length height mapping, off unless set
    discretizationLength: finite.positive().optional(),
    maxHeightDrift: finite.positive().default(50),
    warningAngle: finite.positive().default(100),
    la: finite.positive().default(28.4),
    lb: finite.positive().default(47.7),
    jointLimits: JointLimitsSchema.default({}),
    actuationCommand: z.string().regex(/^[A-Z_][A-Z0-9_]*$/).default('MANUAL_STEPPER'),
    stepper: z.string().regex(/^\w+$/).default('b_stepper'),
    previewStep: finite.positive().default(1),
  })
  .strict();

export type PipelineParams = z.infer<typeof PipelineParamsSchema>;

export const DEFAULT_PARAMS: PipelineParams = PipelineParamsSchema.parse({});

// Проверка параметров один раз на границе конвейера
export function parsePipelineParams(input: unknown = {}): PipelineParams {
  const result = PipelineParamsSchema.safeParse(input);
  if (!result.success) {
    const reasons = result.error.issues
      .map(issue => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    throw ErrorHandler.createError(
      PipelineErrorCode.InvalidConfig,
      `Invalid pipeline parameters: ${reasons}`
    );
  }
  return result.data;
}
