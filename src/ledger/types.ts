import type { SetupErrorKind } from '../control-plane/errors.js';
import type { PipelineState, StepName } from '../control-plane/types.js';

export interface RunSummary {
  sessionId: string;
  finalState: PipelineState;
  passed: boolean;
  executedSteps: StepName[];
  skippedSteps: StepName[];
  /** Best-effort steps that failed without halting the run. */
  toleratedFailures: StepName[];
  failedStep?: StepName;
  failureKind?: SetupErrorKind;
  durationsMs: Partial<Record<StepName, number>>;
}
