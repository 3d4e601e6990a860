import { env } from '../config/env';
import { isSpeakerRole } from '../dialogue/factory';
import { ConfigurationError } from '../errors';
import { NodeLabelStyle } from './conversation-flow';
import { DialogueOfTheDeafOptions } from './dialogue-of-the-deaf';
import { SystemFailureOptions } from './system-failure';

/** Options handed to every detector factory */
export interface DetectorSettings {
  systemFailure: SystemFailureOptions;
  dialogueOfTheDeaf: DialogueOfTheDeafOptions;
  conversationFlow: {
    nodeLabels: NodeLabelStyle;
    delayedReplyStrategy: string;
    maxLookback: number;
  };
}

const NODE_LABEL_STYLES: readonly NodeLabelStyle[] = ['act', 'speaker_act'];

function isNodeLabelStyle(value: string): value is NodeLabelStyle {
  return (NODE_LABEL_STYLES as readonly string[]).includes(value);
}

/** Detector settings from the environment; rejects values no detector understands */
export function detectorSettingsFromEnv(): DetectorSettings {
  const speaker = env.dialogueOfTheDeaf.speaker;
  if (!isSpeakerRole(speaker)) {
    throw new ConfigurationError(`DOTD_SPEAKER must be "agent" or "user", got "${speaker}"`, 'invalid_option');
  }
  const nodeLabels = env.conversationFlow.nodeLabels;
  if (!isNodeLabelStyle(nodeLabels)) {
    throw new ConfigurationError(
      `FLOW_NODE_LABELS must be one of ${NODE_LABEL_STYLES.join(', ')}, got "${nodeLabels}"`,
      'invalid_option',
    );
  }

  return {
    systemFailure: { ignoredErrorTypes: [...env.systemFailure.ignoredErrorTypes] },
    dialogueOfTheDeaf: { speaker },
    conversationFlow: {
      nodeLabels,
      delayedReplyStrategy: env.conversationFlow.delayedReplyStrategy,
      maxLookback: env.conversationFlow.maxLookback,
    },
  };
}
