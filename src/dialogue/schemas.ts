// JSON Schemas for stored transcripts, compiled with ajv by the dialogue reader.

export interface NativeTurnRecord {
  speaker: 'agent' | 'user';
  text: string;
  acts: string[];
  slots?: { slot: string; value: string }[];
  repliesTo?: number;
}

export interface NativeDialogueRecord {
  id: string;
  turns: NativeTurnRecord[];
  metadata?: {
    error?: { errorType: string; message?: string; turnIndex?: number };
    [key: string]: unknown;
  };
}

export interface DialogueKitUtteranceRecord {
  participant: string;
  utterance: string;
  intent?: string;
  dialogue_acts?: { intent: string; annotations?: { slot: string; value: string }[] }[];
  slot_values?: [string, string][];
}

export interface DialogueKitDialogueRecord {
  'conversation ID': string;
  conversation: DialogueKitUtteranceRecord[];
  metadata?: {
    error?: { error_type: string; error_message?: string; turn_index?: number };
    [key: string]: unknown;
  };
}

const slotValueSchema = {
  type: 'object',
  required: ['slot', 'value'],
  properties: {
    slot: { type: 'string', minLength: 1 },
    value: { type: 'string' },
  },
};

export const nativeDialogueSchema = {
  type: 'object',
  required: ['id', 'turns'],
  properties: {
    id: { type: 'string', minLength: 1 },
    turns: {
      type: 'array',
      items: {
        type: 'object',
        required: ['speaker', 'text', 'acts'],
        properties: {
          speaker: { type: 'string', enum: ['agent', 'user'] },
          text: { type: 'string' },
          acts: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
          slots: { type: 'array', items: slotValueSchema },
          repliesTo: { type: 'integer', minimum: 0 },
        },
      },
    },
    metadata: {
      type: 'object',
      properties: {
        error: {
          type: 'object',
          required: ['errorType'],
          properties: {
            errorType: { type: 'string', minLength: 1 },
            message: { type: 'string' },
            turnIndex: { type: 'integer', minimum: 0 },
          },
        },
      },
    },
  },
};

export const dialogueKitDialogueSchema = {
  type: 'object',
  required: ['conversation ID', 'conversation'],
  properties: {
    'conversation ID': { type: 'string', minLength: 1 },
    conversation: {
      type: 'array',
      items: {
        type: 'object',
        required: ['participant', 'utterance'],
        anyOf: [
          { type: 'object', required: ['intent'] },
          { type: 'object', required: ['dialogue_acts'] },
        ],
        properties: {
          participant: { type: 'string', minLength: 1 },
          utterance: { type: 'string' },
          intent: { type: 'string', minLength: 1 },
          dialogue_acts: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              required: ['intent'],
              properties: {
                intent: { type: 'string', minLength: 1 },
                annotations: { type: 'array', items: slotValueSchema },
              },
            },
          },
          slot_values: {
            type: 'array',
            items: {
              type: 'array',
              minItems: 2,
              maxItems: 2,
              items: { type: 'string' },
            },
          },
        },
      },
    },
    metadata: {
      type: 'object',
      properties: {
        error: {
          type: 'object',
          required: ['error_type'],
          properties: {
            error_type: { type: 'string', minLength: 1 },
            error_message: { type: 'string' },
            turn_index: { type: 'integer', minimum: 0 },
          },
        },
      },
    },
  },
};
