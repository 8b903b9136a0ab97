#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { loadPipelineParams } from './config/loader';
import {
  createRunContext,
  curveFromParams,
  PipelineOrchestrator,
} from './pipeline/PipelineOrchestrator';
import { PipelineRunContext, StageResult, StageRunOptions } from './pipeline/types';
import { IssueSeverity, ValidationIssue } from './types';
import { ErrorHandler } from './utils/error-handler';

interface ParamOptions {
  config?: string;
  splineX?: string;
  splineZ?: string;
  layerHeight?: string;
  warningAngle?: string;
  discretization?: string;
  maxHeightDrift?: string;
  la?: string;
  lb?: string;
  stepper?: string;
  step?: string;
}

type StageRunner = (
  orchestrator: PipelineOrchestrator,
  context: PipelineRunContext,
  options: StageRunOptions
) => Promise<StageResult[]>;

const program = new Command();

program
  .name('bendkit')
  .description('Bend flat G-code along a spline and convert it for a 5-axis printer')
  .version('0.1.0');

function parsePair(value: string, name: string): [number, number] {
  const parts = value.split(',').map(part => parseFloat(part.trim()));
  if (parts.length !== 2 || parts.some(part => Number.isNaN(part))) {
    throw new Error(`${name} expects two numbers like 115.5,205.5, got "${value}"`);
  }
  return [parts[0], parts[1]];
}

function parseNumber(value: string, name: string): number {
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} expects a number, got "${value}"`);
  }
  return parsed;
}

// Только явно заданные флаги перекрывают файл конфигурации
function toOverrides(options: ParamOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (options.splineX) overrides.splineX = parsePair(options.splineX, '--spline-x');
  if (options.splineZ) overrides.splineZ = parsePair(options.splineZ, '--spline-z');
  if (options.layerHeight) overrides.layerHeight = parseNumber(options.layerHeight, '--layer-height');
  if (options.warningAngle) overrides.warningAngle = parseNumber(options.warningAngle, '--warning-angle');
  if (options.discretization) {
    overrides.discretizationLength = parseNumber(options.discretization, '--discretization');
  }
  if (options.maxHeightDrift) overrides.maxHeightDrift = parseNumber(options.maxHeightDrift, '--max-height-drift');
  if (options.la) overrides.la = parseNumber(options.la, '--la');
  if (options.lb) overrides.lb = parseNumber(options.lb, '--lb');
  if (options.stepper) overrides.stepper = options.stepper;
  if (options.step) overrides.previewStep = parseNumber(options.step, '--step');
  return overrides;
}

function withParamOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'JSON file with pipeline parameters')
    .option('--spline-x <start,end>', 'Lateral curve endpoints, mm')
    .option('--spline-z <start,end>', 'Height curve endpoints, mm')
    .option('--layer-height <mm>', 'Layer height used by the slicer')
    .option('--warning-angle <deg>', 'Warn when the bend angle exceeds this')
    .option('--discretization <mm>', 'Map print height to curve arc length with this step')
    .option('--max-height-drift <mm>', 'Warn when the curve height drifts this far from Z')
    .option('--la <mm>', 'First link length')
    .option('--lb <mm>', 'Second link length')
    .option('--stepper <name>', 'Rotary stepper name for actuation commands');
}

function formatIssue(issue: ValidationIssue): string {
  const where = issue.line !== undefined ? `layer ${issue.layer}, line ${issue.line}` : `layer ${issue.layer}`;
  const text = `${issue.kind} (${where}): ${issue.message}`;
  return issue.severity === IssueSeverity.Fatal ? chalk.red(text) : chalk.yellow(text);
}

async function runCommand(file: string, options: ParamOptions, runner: StageRunner): Promise<void> {
  let context: PipelineRunContext;
  try {
    const params = await loadPipelineParams(options.config, toOverrides(options));
    context = createRunContext(file, params);
  } catch (err) {
    console.error(chalk.red(`Error: ${err instanceof Error ? ErrorHandler.formatError(err) : String(err)}`));
    process.exitCode = 1;
    return;
  }

  const orchestrator = new PipelineOrchestrator();
  orchestrator.on('issue', ({ issue }) => console.log(formatIssue(issue)));

  // Ctrl-C отменяет текущий этап, временный файл удаляется
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log(chalk.yellow('Cancelling...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const results = await runner(orchestrator, context, { signal: controller.signal });
    for (const result of results) {
      if (result.success) {
        console.log(chalk.green(`${result.stage}: ${result.outputPath}`));
      } else {
        console.error(chalk.red(`${result.stage} failed: [${result.failure?.code}] ${result.failure?.message}`));
        process.exitCode = 1;
      }
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

withParamOptions(program.command('bend'))
  .description('Bend a G-code file (writes BENT_<file>)')
  .argument('<file>', 'Input G-code file')
  .action((file: string, options: ParamOptions) =>
    runCommand(file, options, async (orchestrator, context, run) => [
      await orchestrator.runBending(context, run),
    ])
  );

withParamOptions(program.command('translate'))
  .description('Apply head kinematics to BENT_<file> (writes IK_<file>)')
  .argument('<file>', 'Original input G-code file')
  .action((file: string, options: ParamOptions) =>
    runCommand(file, options, async (orchestrator, context, run) => [
      await orchestrator.runTranslation(context, run),
    ])
  );

withParamOptions(program.command('emit'))
  .description('Convert IK_<file> into controller commands (writes KLIPPER_<file>)')
  .argument('<file>', 'Original input G-code file')
  .action((file: string, options: ParamOptions) =>
    runCommand(file, options, async (orchestrator, context, run) => [
      await orchestrator.runEmission(context, run),
    ])
  );

withParamOptions(program.command('run'))
  .description('Run bending, translation and emission in order')
  .argument('<file>', 'Input G-code file')
  .action((file: string, options: ParamOptions) =>
    runCommand(file, options, (orchestrator, context, run) => orchestrator.runAll(context, run))
  );

program
  .command('status')
  .description('Show how far a file has gone through the pipeline')
  .argument('<file>', 'Input G-code file')
  .action(async (file: string) => {
    try {
      const state = await new PipelineOrchestrator().getState(createRunContext(file));
      console.log(chalk.blue(`${file}: ${state}`));
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? ErrorHandler.formatError(err) : String(err)}`));
      process.exitCode = 1;
    }
  });

withParamOptions(program.command('preview'))
  .description('Print the bending curve as height / offset / angle samples')
  .option('--step <mm>', 'Sample spacing')
  .action(async (options: ParamOptions) => {
    try {
      const params = await loadPipelineParams(options.config, toOverrides(options));
      const samples = new PipelineOrchestrator().previewCurve(curveFromParams(params), params.previewStep);
      console.log(chalk.gray('height\toffset\tangle'));
      for (const sample of samples) {
        console.log(
          `${sample.height.toFixed(2)}\t${sample.lateralOffset.toFixed(3)}\t${sample.tangentAngle.toFixed(2)}`
        );
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? ErrorHandler.formatError(err) : String(err)}`));
      process.exitCode = 1;
    }
  });

if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync().catch(err => {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exitCode = 1;
});
