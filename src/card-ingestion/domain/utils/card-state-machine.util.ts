import { CardProcessingState } from '../enums/card-processing-state.enum';

export class InvalidStateTransitionError extends Error {
  constructor(
    readonly from: CardProcessingState,
    readonly to: CardProcessingState,
  ) {
    super(
      `Invalid state transition: ${from} → ${to}. ` +
        `Valid transitions from ${from}: ${CardStateMachine.getValidTargetStates(from).join(', ') || 'none'}`,
    );
    this.name = 'InvalidStateTransitionError';
    Object.setPrototypeOf(this, InvalidStateTransitionError.prototype);
  }
}

/**
 * Card State Machine Utility
 *
 * Valid Transitions:
 * - FETCHED → OCR_COMPLETE
 * - OCR_COMPLETE → PARSED
 * - PARSED → ACCEPTED | SKIPPED
 * - ACCEPTED → RECORDED
 * - SKIPPED → RECORDED
 * - any non-terminal state → FAILED
 */
export class CardStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    CardProcessingState,
    CardProcessingState[]
  > = new Map([
    [
      CardProcessingState.FETCHED,
      [CardProcessingState.OCR_COMPLETE, CardProcessingState.FAILED],
    ],
    [
      CardProcessingState.OCR_COMPLETE,
      [CardProcessingState.PARSED, CardProcessingState.FAILED],
    ],
    [
      CardProcessingState.PARSED,
      [
        CardProcessingState.ACCEPTED,
        CardProcessingState.SKIPPED,
        CardProcessingState.FAILED,
      ],
    ],
    [
      CardProcessingState.ACCEPTED,
      [CardProcessingState.RECORDED, CardProcessingState.FAILED],
    ],
    [
      CardProcessingState.SKIPPED,
      [CardProcessingState.RECORDED, CardProcessingState.FAILED],
    ],
    // RECORDED and FAILED are terminal
  ]);

  static isValidTransition(
    from: CardProcessingState,
    to: CardProcessingState,
  ): boolean {
    return this.getValidTargetStates(from).includes(to);
  }

  /**
   * @throws InvalidStateTransitionError if the transition is not allowed
   */
  static validateTransition(
    from: CardProcessingState,
    to: CardProcessingState,
  ): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidStateTransitionError(from, to);
    }
  }

  static getValidTargetStates(
    from: CardProcessingState,
  ): CardProcessingState[] {
    return this.VALID_TRANSITIONS.get(from) ?? [];
  }

  static isTerminal(state: CardProcessingState): boolean {
    return this.getValidTargetStates(state).length === 0;
  }
}

/**
 * Current state of one file's run; every move is checked against
 * `CardStateMachine`.
 */
export class CardStateTracker {
  private current?: CardProcessingState;

  get state(): CardProcessingState | undefined {
    return this.current;
  }

  advance(to: CardProcessingState): void {
    if (this.current) {
      CardStateMachine.validateTransition(this.current, to);
    }
    this.current = to;
  }

  /** Move to FAILED unless the run already ended */
  fail(): void {
    if (!this.current || !CardStateMachine.isTerminal(this.current)) {
      this.current = CardProcessingState.FAILED;
    }
  }
}
