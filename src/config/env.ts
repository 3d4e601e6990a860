import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalList(key: string, fallback: string[]): string[] {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Detector selection ─────
  detectors: optionalList('BREAKDOWN_DETECTORS', [
    'system_failure',
    'conversation_flow',
    'dialogue_of_the_deaf',
  ]),

  // ───── Detector options ─────
  systemFailure: {
    ignoredErrorTypes: optionalList('SYSTEM_FAILURE_IGNORED_ERRORS', ['RecursionError']),
  },

  dialogueOfTheDeaf: {
    speaker: optional('DOTD_SPEAKER', 'agent'),
  },

  conversationFlow: {
    nodeLabels: optional('FLOW_NODE_LABELS', 'act'),
    delayedReplyStrategy: optional('DELAYED_REPLY_STRATEGY', 'default'),
    maxLookback: optionalInt('DELAYED_REPLY_MAX_LOOKBACK', 4),
  },

  // ───── Transcript ingestion ─────
  dialogues: {
    agentId: optional('DIALOGUE_AGENT_ID', 'agent'),
    userId: optional('DIALOGUE_USER_ID', 'simulator'),
  },

  // ───── Report ─────
  report: {
    patternMaxLength: optionalInt('PATTERN_MAX_LENGTH', 3),
  },
} as const;
