#!/usr/bin/env node
import * as fs from 'fs';
import { parseArgs } from 'util';
import { env } from './config/env';
import { readDialogues } from './dialogue/dialogue-reader';
import { ConfigurationError, InputError, errorMessage } from './errors';
import { InteractionModel } from './interaction-model/interaction-model';
import { loadInteractionModel } from './interaction-model/model-loader';
import { logger } from './observability/logger';
import { DetectionOrchestrator } from './orchestrator/detection-orchestrator';
import { summarizePatterns } from './report/pattern-summary';

export interface CliOptions {
  dialoguesPath: string;
  interactionModelPath?: string;
  detectors: string[];
  outputFile?: string;
  patternMaxLength: number;
  debug: boolean;
}

const USAGE =
  'Usage: breakdown-audit <dialogues.json> [interaction-model.(json|yaml)] ' +
  '[--detectors a,b] [--output report.json] [--patterns n] [--debug]';

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        detectors: { type: 'string', short: 'd' },
        output: { type: 'string', short: 'o' },
        patterns: { type: 'string', short: 'n' },
        debug: { type: 'boolean', default: false },
      },
    });
  } catch (err) {
    throw new ConfigurationError(`${errorMessage(err)}\n${USAGE}`, 'invalid_option');
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const parsed = parseRawArgs(argv);

  const [dialoguesPath, interactionModelPath, ...extra] = parsed.positionals;
  if (!dialoguesPath || extra.length > 0) {
    throw new ConfigurationError(USAGE, 'invalid_option');
  }

  const detectors = parsed.values.detectors
    ? parsed.values.detectors
        .split(',')
        .map((d) => d.trim())
        .filter((d) => d.length > 0)
    : [...env.detectors];

  const patternMaxLength = parsed.values.patterns ? Number(parsed.values.patterns) : env.report.patternMaxLength;
  if (!Number.isInteger(patternMaxLength) || patternMaxLength < 2) {
    throw new ConfigurationError('--patterns must be an integer of at least 2', 'invalid_option');
  }

  return {
    dialoguesPath,
    ...(interactionModelPath ? { interactionModelPath } : {}),
    detectors,
    ...(parsed.values.output ? { outputFile: parsed.values.output } : {}),
    patternMaxLength,
    debug: parsed.values.debug ?? false,
  };
}

export function runCli(options: CliOptions): void {
  if (options.debug) logger.level = 'debug';

  const dialogues = readDialogues(options.dialoguesPath, env.dialogues);
  let interactionModel: InteractionModel | undefined;
  if (options.interactionModelPath) {
    interactionModel = loadInteractionModel(options.interactionModelPath);
  }

  const orchestrator = new DetectionOrchestrator();
  const report = orchestrator.run({
    dialogues,
    detectors: options.detectors,
    ...(interactionModel ? { interactionModel } : {}),
  });
  const patterns = summarizePatterns(report, options.patternMaxLength);

  logger.info({ byType: report.summary.byType, total: report.summary.total }, 'Breakdown count');

  const output = JSON.stringify({ report, patterns }, null, 2);
  if (options.outputFile) {
    fs.writeFileSync(options.outputFile, output, 'utf-8');
    logger.info({ outputFile: options.outputFile }, 'Report written');
  } else {
    process.stdout.write(`${output}\n`);
  }
}

function main(): void {
  try {
    runCli(parseCliArgs(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof InputError) {
      logger.error({ code: err.code }, err.message);
      process.exitCode = 1;
      return;
    }
    logger.fatal({ err }, 'Breakdown detection failed');
    process.exitCode = 2;
  }
}

if (require.main === module) {
  main();
}
