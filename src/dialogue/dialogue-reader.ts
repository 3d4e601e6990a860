import * as fs from 'fs';
import Ajv from 'ajv';
import { createDialogue } from './factory';
import {
  DialogueKitDialogueRecord,
  DialogueKitUtteranceRecord,
  NativeDialogueRecord,
  dialogueKitDialogueSchema,
  nativeDialogueSchema,
} from './schemas';
import { Dialogue, DialogueInput, SlotValue, SpeakerRole, TurnInput } from './types';
import { DialogueValidationError, errorMessage } from '../errors';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });
const validateNative = ajv.compile<NativeDialogueRecord>(nativeDialogueSchema);
const validateDialogueKit = ajv.compile<DialogueKitDialogueRecord>(dialogueKitDialogueSchema);

export interface ReadDialoguesOptions {
  /** Participant id used for the agent in DialogueKit exports */
  agentId: string;
  /** Participant id used for the user (or simulator) in DialogueKit exports */
  userId: string;
}

const log = logger.child({ component: 'dialogue-reader' });

/**
 * Read a JSON transcript file holding an array of dialogues, in either the
 * native layout or the DialogueKit export layout.
 */
export function readDialogues(filePath: string, options: ReadDialoguesOptions): Dialogue[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new DialogueValidationError(`Cannot read dialogues file ${filePath}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new DialogueValidationError(`Dialogues file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }

  const dialogues = parseDialogues(data, options);
  log.info({ filePath, count: dialogues.length }, 'Dialogues loaded');
  return dialogues;
}

export function parseDialogues(data: unknown, options: ReadDialoguesOptions): Dialogue[] {
  if (!Array.isArray(data)) {
    throw new DialogueValidationError('Expected an array of dialogues');
  }
  return data.map((record: unknown, position) => parseDialogue(record, position, options));
}

function parseDialogue(record: unknown, position: number, options: ReadDialoguesOptions): Dialogue {
  if (validateNative(record)) {
    return createDialogue(fromNative(record));
  }
  const nativeErrors = ajv.errorsText(validateNative.errors);

  if (validateDialogueKit(record)) {
    return createDialogue(fromDialogueKit(record, options));
  }
  const dialogueKitErrors = ajv.errorsText(validateDialogueKit.errors);

  throw new DialogueValidationError(
    `Dialogue at position ${position} matches no known transcript layout ` +
      `(native: ${nativeErrors}; DialogueKit: ${dialogueKitErrors})`,
  );
}

function fromNative(record: NativeDialogueRecord): DialogueInput {
  return {
    id: record.id,
    turns: record.turns.map((t) => ({
      speaker: t.speaker,
      text: t.text,
      acts: t.acts,
      ...(t.slots ? { slots: t.slots } : {}),
      ...(t.repliesTo !== undefined ? { repliesTo: t.repliesTo } : {}),
    })),
    ...(record.metadata ? { metadata: record.metadata } : {}),
  };
}

function fromDialogueKit(record: DialogueKitDialogueRecord, options: ReadDialoguesOptions): DialogueInput {
  const id = record['conversation ID'];
  const turns = record.conversation.map((u, i) => toTurnInput(id, i, u, options));

  const { error, ...rest } = record.metadata ?? {};
  return {
    id,
    turns,
    metadata: {
      ...rest,
      ...(error
        ? {
            error: {
              errorType: error.error_type,
              ...(error.error_message !== undefined ? { message: error.error_message } : {}),
              ...(error.turn_index !== undefined ? { turnIndex: error.turn_index } : {}),
            },
          }
        : {}),
    },
  };
}

function toTurnInput(
  dialogueId: string,
  position: number,
  u: DialogueKitUtteranceRecord,
  options: ReadDialoguesOptions,
): TurnInput {
  const speaker = resolveSpeaker(u.participant, options);
  if (!speaker) {
    throw new DialogueValidationError(
      `Dialogue ${dialogueId}: turn ${position} has unknown participant "${u.participant}"`,
      dialogueId,
    );
  }

  const acts: string[] = [];
  const slots: SlotValue[] = [];
  if (u.dialogue_acts) {
    for (const da of u.dialogue_acts) {
      acts.push(...splitIntent(da.intent));
      slots.push(...(da.annotations ?? []));
    }
  } else if (u.intent) {
    acts.push(...splitIntent(u.intent));
  }
  for (const [slot, value] of u.slot_values ?? []) {
    slots.push({ slot, value });
  }

  return {
    speaker,
    text: u.utterance,
    acts,
    ...(slots.length > 0 ? { slots } : {}),
  };
}

/** Composite intents are stored joined with `+` */
function splitIntent(intent: string): string[] {
  return intent
    .split('+')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

function resolveSpeaker(participant: string, options: ReadDialoguesOptions): SpeakerRole | null {
  const p = participant.toLowerCase();
  if (p === options.agentId.toLowerCase() || p === 'agent') return 'agent';
  if (p === options.userId.toLowerCase() || p === 'user') return 'user';
  return null;
}
