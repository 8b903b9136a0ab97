import fs from 'fs/promises';
import { PipelineErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { parsePipelineParams, PipelineParams } from './schema';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON parameter file and applies overrides on top of it. The merged
 * record is validated once; nothing is re-parsed per stage.
 */
export async function loadPipelineParams(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): Promise<PipelineParams> {
  let fromFile: Record<string, unknown> = {};

  if (configPath) {
    let raw: string;
    try {
      raw = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      throw ErrorHandler.fromFsError(error, configPath);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw ErrorHandler.createError(
        PipelineErrorCode.InvalidConfig,
        `Config ${configPath} is not valid JSON`,
        { path: configPath, cause: error }
      );
    }
    if (!isRecord(parsed)) {
      throw ErrorHandler.createError(
        PipelineErrorCode.InvalidConfig,
        `Config ${configPath} must contain a JSON object`,
        { path: configPath }
      );
    }
    fromFile = parsed;
  }

  return parsePipelineParams({ ...fromFile, ...overrides });
}
