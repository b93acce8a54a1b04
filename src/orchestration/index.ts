export { AllocationReconciler } from './allocation-reconciler';
export type { AllocationReconcilerOptions } from './allocation-reconciler';
export { CorrelationIndex } from './correlation-index';
export { Launcher } from './launcher';
export type { LauncherOptions, LauncherSettings } from './launcher';
export { ReadinessPoller, fillExtendedAttributes } from './readiness-poller';
export type { PollerSettings, ReadinessPollerOptions } from './readiness-poller';
export { retryUntil, settle, settleEach, sleep, throwIfInterrupted } from './concurrency';
export type { RetryUntilOptions, Settled } from './concurrency';
export * from './errors';
export type { OperationOptions } from './types';
