export * from './dialogue/types';
export { createDialogue, validateDialogue } from './dialogue/factory';
export { actPath, turnPathLabel } from './dialogue/act-path';
export { readDialogues, parseDialogues, ReadDialoguesOptions } from './dialogue/dialogue-reader';

export { InteractionModel, InteractionModelSpec, Transition } from './interaction-model/interaction-model';
export { loadInteractionModel, parseInteractionModel } from './interaction-model/model-loader';

export * from './detectors/types';
export { SystemFailureDetector, SystemFailureOptions } from './detectors/system-failure';
export {
  DialogueOfTheDeafDetector,
  DialogueOfTheDeafOptions,
  normalizeUtterance,
} from './detectors/dialogue-of-the-deaf';
export { ConversationFlowDetector, ConversationFlowOptions, NodeLabelStyle } from './detectors/conversation-flow';
export * from './detectors/delayed-reply';
export { DetectorRegistry, DetectorFactory, createBuiltinRegistry } from './detectors/registry';
export { DetectorSettings, detectorSettingsFromEnv } from './detectors/settings';

export { DetectionOrchestrator } from './orchestrator/detection-orchestrator';
export { DetectionRequest, OrchestratorState, Report, ReportSummary } from './orchestrator/types';
export { summarizePatterns, ConversationalPattern, PatternSummary } from './report/pattern-summary';

export * from './errors';
