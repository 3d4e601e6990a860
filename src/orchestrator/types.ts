import { Dialogue } from '../dialogue/types';
import { BreakdownType, Finding } from '../detectors/types';
import { InteractionModel } from '../interaction-model/interaction-model';

export type OrchestratorState = 'IDLE' | 'RUNNING' | 'COMPLETE';

/** Valid orchestrator state transitions */
export const RUN_STATE_TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  IDLE: ['RUNNING'],
  RUNNING: ['COMPLETE', 'IDLE'],
  COMPLETE: ['RUNNING'],
};

export interface DetectionRequest {
  dialogues: readonly Dialogue[];
  /** Detector identifiers (or aliases) to run */
  detectors: readonly string[];
  /** Required when any selected detector is model-dependent */
  interactionModel?: InteractionModel;
}

export interface ReportSummary {
  readonly total: number;
  readonly byType: Readonly<Record<BreakdownType, number>>;
  readonly byDetector: Readonly<Record<string, number>>;
  readonly dialoguesWithBreakdowns: number;
}

/** Findings of one detection run, keyed by dialogue id */
export interface Report {
  readonly runId: string;
  readonly startedAt: string;
  readonly completedAt: string;
  /** Canonical ids of the detectors that ran, in selection order */
  readonly detectors: readonly string[];
  /** Dialogue ids in batch order */
  readonly dialogueIds: readonly string[];
  readonly findings: Readonly<Record<string, readonly Finding[]>>;
  readonly summary: ReportSummary;
}
