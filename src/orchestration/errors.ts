import { ProviderResourceId, RecordFailure, TerminalLifecycle, VirtualInstanceId } from '../types';

/**
 * Raised when the caller aborts an allocation. Never downgraded to a
 * per-resource failure.
 */
export class AllocationInterruptedError extends Error {
  constructor(message = 'Allocation was interrupted') {
    super(message);
    this.name = 'AllocationInterruptedError';
  }
}

export interface AllocationOutcome {
  virtualInstanceId: VirtualInstanceId;
  providerResourceId?: ProviderResourceId;
  lifecycle: TerminalLifecycle;
  reason?: string;
}

/**
 * Raised when fewer resources became ready than the request's minimum.
 * `outcomes` covers every requested virtual instance ID.
 */
export class AllocationError extends Error {
  readonly allocationId: string;
  readonly minCount: number;
  readonly readyCount: number;
  readonly outcomes: AllocationOutcome[];
  readonly failures: RecordFailure[];

  constructor(allocationId: string, minCount: number, outcomes: AllocationOutcome[], failures: RecordFailure[]) {
    const readyCount = outcomes.filter(outcome => outcome.lifecycle === 'ready').length;
    const lines = outcomes.map(outcome => {
      const resource = outcome.providerResourceId ? ` (${outcome.providerResourceId})` : '';
      const reason = outcome.reason ? `: ${outcome.reason}` : '';
      return `  ${outcome.virtualInstanceId}${resource} ${outcome.lifecycle}${reason}`;
    });
    super(
      `Problem allocating instances: ${readyCount} of ${outcomes.length} ready, at least ${minCount} required\n` +
        lines.join('\n')
    );
    this.name = 'AllocationError';
    this.allocationId = allocationId;
    this.minCount = minCount;
    this.readyCount = readyCount;
    this.outcomes = outcomes;
    this.failures = failures;
  }

  get failedInstanceIds(): VirtualInstanceId[] {
    return this.outcomes
      .filter(outcome => outcome.lifecycle !== 'ready')
      .map(outcome => outcome.virtualInstanceId);
  }
}

export function isInterruption(error: unknown): error is AllocationInterruptedError {
  return error instanceof AllocationInterruptedError;
}
