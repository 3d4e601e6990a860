import { v4 as uuid } from 'uuid';
import { validateDialogue } from '../dialogue/factory';
import { Dialogue } from '../dialogue/types';
import { createFinding } from '../detectors/finding';
import { DetectorRegistry, createBuiltinRegistry } from '../detectors/registry';
import { DetectorSettings, detectorSettingsFromEnv } from '../detectors/settings';
import { Detector, Finding } from '../detectors/types';
import { InteractionModel } from '../interaction-model/interaction-model';
import {
  ConfigurationError,
  DialogueValidationError,
  MissingInteractionModelError,
  OrchestratorStateError,
  errorMessage,
} from '../errors';
import { logger, runLogger } from '../observability/logger';
import { ReportBuilder } from './report-builder';
import { DetectionRequest, OrchestratorState, RUN_STATE_TRANSITIONS, Report } from './types';

/**
 * DetectionOrchestrator runs the selected breakdown detectors over a batch of
 * dialogues and aggregates their findings into a Report.
 *
 * Input problems (unknown detector, missing interaction model, malformed
 * dialogue) are rejected before anything runs. Once running, a detector that
 * throws on one dialogue is recorded as a `detector_error` finding for that
 * pair and the batch continues.
 */
export class DetectionOrchestrator {
  private log = logger.child({ component: 'detection-orchestrator' });
  private state: OrchestratorState = 'IDLE';
  private report: Report | null = null;

  constructor(
    private readonly registry: DetectorRegistry = createBuiltinRegistry(),
    private readonly settings: DetectorSettings = detectorSettingsFromEnv(),
  ) {}

  getState(): OrchestratorState {
    return this.state;
  }

  /** Report of the last completed run */
  getReport(): Report {
    if (this.state !== 'COMPLETE' || !this.report) {
      throw new OrchestratorStateError(`No report available in state ${this.state}`);
    }
    return this.report;
  }

  run(request: DetectionRequest): Report {
    const detectors = this.prepare(request);
    const model = request.interactionModel;

    this.transition('RUNNING');
    const runId = uuid();
    const log = runLogger(runId, { component: 'detection-orchestrator' });
    const startedAt = new Date();

    try {
      log.info(
        { dialogues: request.dialogues.length, detectors: detectors.map((d) => d.id) },
        'Detection run starting',
      );

      const builder = new ReportBuilder(
        runId,
        startedAt,
        detectors.map((d) => d.id),
        request.dialogues.map((d) => d.id),
      );

      for (const dialogue of request.dialogues) {
        for (const detector of detectors) {
          builder.add(dialogue.id, this.evaluatePair(detector, dialogue, model, log));
        }
      }

      const report = builder.build();
      log.info(
        {
          ...report.summary,
          durationMs: Date.now() - startedAt.getTime(),
        },
        'Detection run completed',
      );

      this.report = report;
      this.transition('COMPLETE');
      return report;
    } catch (err) {
      log.error({ err }, 'Detection run aborted');
      this.report = null;
      this.transition('IDLE');
      throw err;
    }
  }

  // ───── Request validation ─────

  private prepare(request: DetectionRequest): Detector[] {
    if (request.detectors.length === 0) {
      throw new ConfigurationError('No breakdown detectors selected', 'empty_selection');
    }

    const unknown = request.detectors.filter((name) => !this.registry.has(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Unknown breakdown detector(s): ${unknown.join(', ')} (known: ${this.registry.ids().join(', ')})`,
        'unknown_detector',
      );
    }

    const ids: string[] = [];
    for (const name of request.detectors) {
      const id = this.registry.resolve(name);
      if (id && !ids.includes(id)) ids.push(id);
    }
    const detectors = ids.map((id) => this.registry.create(id, this.settings));

    const needingModel = detectors.filter((d) => d.requiresInteractionModel).map((d) => d.id);
    if (needingModel.length > 0 && !request.interactionModel) {
      throw new MissingInteractionModelError(needingModel);
    }

    const seen = new Set<string>();
    for (const dialogue of request.dialogues) {
      validateDialogue(dialogue);
      if (seen.has(dialogue.id)) {
        throw new DialogueValidationError(`Duplicate dialogue id ${dialogue.id} in batch`, dialogue.id);
      }
      seen.add(dialogue.id);
    }

    return detectors;
  }

  // ───── Evaluation ─────

  private evaluatePair(
    detector: Detector,
    dialogue: Dialogue,
    model: InteractionModel | undefined,
    log: typeof logger,
  ): Finding[] {
    try {
      const findings = this.invoke(detector, dialogue, model);
      log.debug({ detector: detector.id, dialogueId: dialogue.id, count: findings.length }, 'Detector evaluated');
      return findings;
    } catch (err) {
      log.error({ err, detector: detector.id, dialogueId: dialogue.id }, 'Detector failed on dialogue');
      const lastTurn = Math.max(dialogue.turns.length - 1, 0);
      return [
        createFinding(
          detector.id,
          'detector_error',
          dialogue,
          0,
          `Detector ${detector.id} failed: ${errorMessage(err)}`,
          { start: 0, end: lastTurn },
        ),
      ];
    }
  }

  private invoke(detector: Detector, dialogue: Dialogue, model: InteractionModel | undefined): Finding[] {
    if (!detector.requiresInteractionModel) {
      return detector.run(dialogue);
    }
    if (!model) {
      throw new MissingInteractionModelError([detector.id]);
    }
    return detector.run(dialogue, model);
  }

  private transition(target: OrchestratorState): void {
    if (!RUN_STATE_TRANSITIONS[this.state].includes(target)) {
      throw new OrchestratorStateError(`Invalid orchestrator transition ${this.state} -> ${target}`);
    }
    this.log.debug({ from: this.state, to: target }, 'Orchestrator state transition');
    this.state = target;
  }
}
