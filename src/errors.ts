/**
 * Input errors are raised before any detection runs and are fatal to the run.
 * Everything that goes wrong while a detector evaluates a dialogue is recorded
 * in the report instead (see `detector_error` findings).
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'InputError';
  }
}

export class ConfigurationError extends InputError {
  constructor(message: string, code: 'unknown_detector' | 'empty_selection' | 'invalid_option') {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}

export class MissingInteractionModelError extends InputError {
  constructor(public readonly detectorIds: string[]) {
    super(
      `Interaction model required by selected detector(s): ${detectorIds.join(', ')}`,
      'missing_interaction_model',
    );
    this.name = 'MissingInteractionModelError';
  }
}

export class DialogueValidationError extends InputError {
  constructor(
    message: string,
    public readonly dialogueId?: string,
  ) {
    super(message, 'invalid_dialogue');
    this.name = 'DialogueValidationError';
  }
}

export class InteractionModelError extends InputError {
  constructor(message: string) {
    super(message, 'invalid_interaction_model');
    this.name = 'InteractionModelError';
  }
}

/** Raised when the orchestrator is asked for something its current state cannot give. */
export class OrchestratorStateError extends Error {
  public readonly code = 'invalid_state';

  constructor(message: string) {
    super(message);
    this.name = 'OrchestratorStateError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
