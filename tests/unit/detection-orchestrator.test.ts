import { DetectionOrchestrator } from '../../src/orchestrator/detection-orchestrator';
import { createBuiltinRegistry } from '../../src/detectors/registry';
import { Detector } from '../../src/detectors/types';
import { Dialogue } from '../../src/dialogue/types';
import { InteractionModel } from '../../src/interaction-model/interaction-model';
import {
  ConfigurationError,
  DialogueValidationError,
  MissingInteractionModelError,
  OrchestratorStateError,
} from '../../src/errors';
import { makeDialogue } from '../helpers/dialogues';
import { TEST_SETTINGS } from '../helpers/settings';

const ALL = ['system_failure', 'dialogue_of_the_deaf', 'conversation_flow'];

describe('DetectionOrchestrator', () => {
  const model = InteractionModel.fromSpec({
    edges: [
      ['request', 'inform'],
      ['inform', 'recommend'],
    ],
  });

  const clean = makeDialogue('clean', [
    ['agent', 'What would you like?', ['request']],
    ['user', 'A heist movie.', ['inform']],
    ['agent', "Ocean's Eleven.", ['recommend']],
  ]);
  const repeat = makeDialogue('repeat', [
    ['agent', "Sorry, I didn't understand", ['clarify']],
    ['agent', "Sorry, I didn't understand", ['clarify']],
    ['user', 'ok', ['inform']],
  ]);
  const crashed = makeDialogue(
    'crashed',
    [
      ['user', 'Suggest something', ['request']],
      ['agent', 'Heat.', ['recommend']],
    ],
    { errorType: 'KeyError', turnIndex: 4 },
  );
  const batch = [clean, repeat, crashed];

  let orchestrator: DetectionOrchestrator;

  beforeEach(() => {
    orchestrator = new DetectionOrchestrator(createBuiltinRegistry(), TEST_SETTINGS);
  });

  describe('state machine', () => {
    it('should start idle with no report', () => {
      expect(orchestrator.getState()).toBe('IDLE');
      expect(() => orchestrator.getReport()).toThrow(OrchestratorStateError);
    });

    it('should be complete after a run and expose the report', () => {
      const report = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
      expect(orchestrator.getState()).toBe('COMPLETE');
      expect(orchestrator.getReport()).toBe(report);
    });

    it('should allow another run once complete', () => {
      const first = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
      const second = orchestrator.run({ dialogues: [clean], detectors: ['system_failure'] });
      expect(second.runId).not.toBe(first.runId);
      expect(second.dialogueIds).toEqual(['clean']);
      expect(orchestrator.getReport()).toBe(second);
    });
  });

  describe('report', () => {
    it('should key ordered findings by dialogue id', () => {
      const report = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });

      expect(report.detectors).toEqual(ALL);
      expect(report.dialogueIds).toEqual(['clean', 'repeat', 'crashed']);
      expect(report.findings.clean).toEqual([]);
      expect(report.findings.repeat.map((f) => [f.type, f.turnIndex])).toEqual([
        ['dialogue_of_the_deaf', 1],
        ['unexpected_transition', 1],
        ['unexpected_transition', 2],
      ]);
      expect(report.findings.crashed.map((f) => [f.type, f.turnIndex])).toEqual([
        ['unexpected_transition', 1],
        ['system_failure', 4],
      ]);
    });

    it('should count findings per breakdown type and detector', () => {
      const report = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
      expect(report.summary).toEqual({
        total: 5,
        byType: {
          system_failure: 1,
          dialogue_of_the_deaf: 1,
          delayed_reply: 0,
          unexpected_transition: 3,
          detector_error: 0,
        },
        byDetector: {
          system_failure: 1,
          dialogue_of_the_deaf: 1,
          conversation_flow: 3,
        },
        dialoguesWithBreakdowns: 2,
      });
    });

    it('should return a frozen report', () => {
      const report = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.findings)).toBe(true);
      expect(Object.isFrozen(report.findings.repeat)).toBe(true);
      expect(Object.isFrozen(report.findings.repeat[0])).toBe(true);
      expect(Object.isFrozen(report.summary.byType)).toBe(true);
    });

    it('should run an aliased detector once', () => {
      const report = orchestrator.run({
        dialogues: [crashed],
        detectors: ['conversation_flow', 'flow_discontinuation'],
        interactionModel: model,
      });
      expect(report.detectors).toEqual(['conversation_flow']);
      expect(report.findings.crashed).toHaveLength(1);
    });

    it('should not need a model when only model-free detectors are selected', () => {
      const report = orchestrator.run({ dialogues: batch, detectors: ['dialogue_of_the_deaf'] });
      expect(report.summary.total).toBe(1);
      expect(report.findings.repeat[0].turnIndex).toBe(1);
    });
  });

  describe('input errors', () => {
    it('should reject an unknown detector before running anything', () => {
      const registry = createBuiltinRegistry();
      const run = jest.fn().mockReturnValue([]);
      registry.register('spy', () => ({ id: 'spy', requiresInteractionModel: false, run }));
      const guarded = new DetectionOrchestrator(registry, TEST_SETTINGS);

      expect(() => guarded.run({ dialogues: batch, detectors: ['spy', 'sentiment'] })).toThrow(
        'Unknown breakdown detector(s): sentiment',
      );
      expect(run).not.toHaveBeenCalled();
      expect(guarded.getState()).toBe('IDLE');
    });

    it('should reject an empty selection', () => {
      expect(() => orchestrator.run({ dialogues: batch, detectors: [] })).toThrow(ConfigurationError);
    });

    it('should require the interaction model for model-dependent detectors', () => {
      expect(() => orchestrator.run({ dialogues: batch, detectors: ALL })).toThrow(MissingInteractionModelError);
      expect(orchestrator.getState()).toBe('IDLE');
    });

    it('should reject a malformed dialogue', () => {
      const malformed: Dialogue = {
        id: 'malformed',
        turns: [{ index: 0, speaker: 'agent', utterance: { text: 'Hi', speaker: 'agent' }, acts: [] }],
        metadata: {},
      };
      expect(() => orchestrator.run({ dialogues: [clean, malformed], detectors: ['system_failure'] })).toThrow(
        DialogueValidationError,
      );
    });

    it('should reject duplicate dialogue ids', () => {
      expect(() => orchestrator.run({ dialogues: [clean, clean], detectors: ['system_failure'] })).toThrow(
        'Duplicate dialogue id clean in batch',
      );
    });
  });

  describe('detector failures', () => {
    const exploding: Detector = {
      id: 'exploding',
      requiresInteractionModel: false,
      run: (dialogue: Dialogue) => {
        if (dialogue.id === 'repeat') throw new Error('boom');
        return [];
      },
    };

    it('should record a detector error for the failing pair and keep going', () => {
      const registry = createBuiltinRegistry();
      registry.register('exploding', () => exploding);
      const isolated = new DetectionOrchestrator(registry, TEST_SETTINGS);

      const report = isolated.run({ dialogues: batch, detectors: ['dialogue_of_the_deaf', 'exploding'] });

      expect(isolated.getState()).toBe('COMPLETE');
      expect(report.findings.repeat.map((f) => [f.type, f.detector, f.turnIndex])).toEqual([
        ['detector_error', 'exploding', 0],
        ['dialogue_of_the_deaf', 'dialogue_of_the_deaf', 1],
      ]);
      expect(report.findings.repeat[0].explanation).toBe('Detector exploding failed: boom');
      expect(report.findings.repeat[0].turnRange).toEqual({ start: 0, end: 2 });
      expect(report.findings.clean).toEqual([]);
      expect(report.findings.crashed).toEqual([]);
      expect(report.summary.byType.detector_error).toBe(1);
      expect(report.summary.dialoguesWithBreakdowns).toBe(1);
    });

    it('should not change findings of other dialogues', () => {
      const registry = createBuiltinRegistry();
      registry.register('exploding', () => exploding);
      const withFailure = new DetectionOrchestrator(registry, TEST_SETTINGS).run({
        dialogues: batch,
        detectors: [...ALL, 'exploding'],
        interactionModel: model,
      });
      const withoutFailure = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });

      expect(withFailure.findings.clean).toEqual(withoutFailure.findings.clean);
      expect(withFailure.findings.crashed).toEqual(withoutFailure.findings.crashed);
    });
  });

  it('should produce identical findings on repeated runs', () => {
    const first = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
    const second = orchestrator.run({ dialogues: batch, detectors: ALL, interactionModel: model });
    expect(second.findings).toEqual(first.findings);
    expect(second.summary).toEqual(first.summary);
  });
});
