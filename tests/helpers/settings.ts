import { DetectorSettings } from '../../src/detectors/settings';

export const TEST_SETTINGS: DetectorSettings = {
  systemFailure: { ignoredErrorTypes: ['RecursionError'] },
  dialogueOfTheDeaf: { speaker: 'agent' },
  conversationFlow: { nodeLabels: 'act', delayedReplyStrategy: 'default', maxLookback: 4 },
};
