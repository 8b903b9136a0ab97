import fs from 'fs/promises';
import path from 'path';
import { createRunContext, PipelineOrchestrator } from '../src/pipeline/PipelineOrchestrator';
import { SplineCurve } from '../src/bending/SplineCurve';
import { PipelineErrorCode, PipelineStage, PipelineState } from '../src/types';
import { StageResult } from '../src/pipeline/types';
import { GCODE_FIXTURES } from './fixtures/gcode-fixtures';
import { createTempDir, listFiles, removeTempDir, silenceConsole } from './helpers/test-data';

const BENT_TEXT = '; bendkit stage=bent\nG1 X10.05875 Y10 Z5 A0 B1.446 E1.00262 F1200\n';
const IK_TEXT = '; bendkit stage=translated\nG1 X11.26245 Y10 Z4.985 A0 B1.446 E1.00262 F1200\n';
const READY_TEXT =
  '; bendkit stage=ready\nMANUAL_STEPPER STEPPER=b_stepper MOVE=1.446\nG1 X11.26245 Y10 Z4.985 E1.00262 F1200\n';

describe('PipelineOrchestrator', () => {
  let orchestrator: PipelineOrchestrator;
  let dir: string;
  let inputPath: string;

  beforeEach(async () => {
    silenceConsole();
    orchestrator = new PipelineOrchestrator();
    dir = await createTempDir();
    inputPath = path.join(dir, 'part.gcode');
    await fs.writeFile(inputPath, GCODE_FIXTURES.singleMove, 'utf-8');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  test('should run all stages and write every artifact', async () => {
    const context = createRunContext(inputPath);

    const results = await orchestrator.runAll(context);

    expect(results.map(result => result.success)).toEqual([true, true, true]);
    expect(results.map(result => result.state)).toEqual([
      PipelineState.Bent,
      PipelineState.Translated,
      PipelineState.Ready,
    ]);
    await expect(fs.readFile(path.join(dir, 'BENT_part.gcode'), 'utf-8')).resolves.toBe(BENT_TEXT);
    await expect(fs.readFile(path.join(dir, 'IK_part.gcode'), 'utf-8')).resolves.toBe(IK_TEXT);
    await expect(fs.readFile(path.join(dir, 'KLIPPER_part.gcode'), 'utf-8')).resolves.toBe(READY_TEXT);
    await expect(orchestrator.getState(context)).resolves.toBe(PipelineState.Ready);
  });

  test('should rewrite the bent artifact byte for byte on a second run', async () => {
    await orchestrator.runBending(createRunContext(inputPath));
    const first = await fs.readFile(path.join(dir, 'BENT_part.gcode'));

    await orchestrator.runBending(createRunContext(inputPath));
    const second = await fs.readFile(path.join(dir, 'BENT_part.gcode'));

    expect(second.equals(first)).toBe(true);
  });

  test('should refuse to translate before bending', async () => {
    const result = await orchestrator.runTranslation(createRunContext(inputPath));

    expect(result.success).toBe(false);
    expect(result.failure?.code).toBe(PipelineErrorCode.StageDependency);
    expect(result.failure?.path).toBe(path.join(dir, 'BENT_part.gcode'));
    await expect(listFiles(dir)).resolves.toEqual(['part.gcode']);
  });

  test('should refuse an artifact that another stage did not produce', async () => {
    await fs.writeFile(path.join(dir, 'IK_part.gcode'), 'G1 X1 B2\n', 'utf-8');

    const result = await orchestrator.runEmission(createRunContext(inputPath));

    expect(result.failure?.code).toBe(PipelineErrorCode.StageDependency);
    await expect(listFiles(dir)).resolves.toEqual(['IK_part.gcode', 'part.gcode']);
  });

  test('should report a missing input file', async () => {
    const result = await orchestrator.runBending(createRunContext(path.join(dir, 'missing.gcode')));

    expect(result.success).toBe(false);
    expect(result.state).toBe(PipelineState.Raw);
    expect(result.failure?.code).toBe(PipelineErrorCode.IOError);
  });

  test('should stop the chain at the first failed stage', async () => {
    const context = createRunContext(inputPath, { jointLimits: { b: [-1, 1] } });

    const results = await orchestrator.runAll(context);

    expect(results.map(result => result.success)).toEqual([true, false]);
    expect(results[1].failure).toMatchObject({
      code: PipelineErrorCode.FatalValidation,
      layer: 18,
      line: 2,
    });
    await expect(listFiles(dir)).resolves.toEqual(['BENT_part.gcode', 'part.gcode']);
    await expect(orchestrator.getState(context)).resolves.toBe(PipelineState.Bent);
  });

  test('should emit stage events and attach warnings to the result', async () => {
    const started: PipelineStage[] = [];
    const completed: StageResult[] = [];
    orchestrator.on('stageStarted', event => started.push(event.stage));
    orchestrator.on('stageCompleted', result => completed.push(result));
    const onIssue = jest.fn();
    orchestrator.on('issue', onIssue);

    const context = createRunContext(inputPath, { warningAngle: 1 });
    const result = await orchestrator.runBending(context);

    expect(result.success).toBe(true);
    expect(result.issues).toHaveLength(1);
    expect(started).toEqual([PipelineStage.Bending]);
    expect(completed).toEqual([result]);
    expect(onIssue).toHaveBeenCalledWith({
      runId: context.runId,
      stage: PipelineStage.Bending,
      issue: result.issues[0],
    });
  });

  test('should leave no artifact behind when cancelled', async () => {
    const controller = new AbortController();
    orchestrator.on('issue', () => controller.abort());

    const result = await orchestrator.runBending(createRunContext(inputPath, { warningAngle: 1 }), {
      signal: controller.signal,
    });

    expect(result.success).toBe(false);
    expect(result.failure?.code).toBe(PipelineErrorCode.Cancelled);
    await expect(listFiles(dir)).resolves.toEqual(['part.gcode']);
  });

  test('should run independent files concurrently', async () => {
    const otherPath = path.join(dir, 'other.gcode');
    await fs.writeFile(otherPath, 'G1 X0 Y0 Z0.2 E0.1\n', 'utf-8');
    const first = createRunContext(inputPath);
    const second = createRunContext(otherPath);

    const results = await Promise.all([orchestrator.runAll(first), orchestrator.runAll(second)]);

    expect(first.runId).not.toBe(second.runId);
    expect(results.every(run => run.every(result => result.success))).toBe(true);
    await expect(fs.readFile(path.join(dir, 'BENT_part.gcode'), 'utf-8')).resolves.toBe(BENT_TEXT);
  });

  test('should report the raw state for a fresh file', async () => {
    await expect(orchestrator.getState(createRunContext(inputPath))).resolves.toBe(PipelineState.Raw);
  });

  test('should preview the curve without touching the disk', async () => {
    const samples = orchestrator.previewCurve(new SplineCurve({ x: [115.5, 205.5], z: [0, 100] }), 50);

    expect(samples.map(sample => sample.height)).toEqual([0, 50, 100]);
    expect(samples[2].lateralOffset).toBe(90);
    await expect(listFiles(dir)).resolves.toEqual(['part.gcode']);
  });
});

describe('createRunContext', () => {
  test('should validate parameters once and freeze the context', () => {
    const context = createRunContext('/tmp/model.gcode', { layerHeight: 0.2 });

    expect(context.params.layerHeight).toBe(0.2);
    expect(context.params.la).toBe(28.4);
    expect(context.artifacts[PipelineStage.Emission]).toBe(path.join('/tmp', 'KLIPPER_model.gcode'));
    expect(Object.isFrozen(context)).toBe(true);
    expect(context.runId).toMatch(/^run_\d+_[a-z0-9]+$/);
  });

  test('should reject invalid parameters', () => {
    expect(() => createRunContext('/tmp/model.gcode', { layerHeight: -1 })).toThrow(
      'Invalid pipeline parameters: layerHeight: Number must be greater than 0'
    );
  });
});
