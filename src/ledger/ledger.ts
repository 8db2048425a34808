import { isSetupError } from '../control-plane/errors.js';
import type { ExecutionContext, PipelineOutcome, StepName } from '../control-plane/types.js';
import type { RunSummary } from './types.js';

export function buildRunSummary(ctx: ExecutionContext, outcome: PipelineOutcome): RunSummary {
  const durationsMs: Partial<Record<StepName, number>> = {};
  const executedSteps: StepName[] = [];
  const skippedSteps: StepName[] = [];
  const toleratedFailures: StepName[] = [];

  for (const result of ctx.stepResults) {
    durationsMs[result.name] = result.durationMs;
    if (result.status === 'skipped') {
      skippedSteps.push(result.name);
      continue;
    }
    executedSteps.push(result.name);
    if (result.status === 'failed' && result.name !== outcome.failedStep) {
      toleratedFailures.push(result.name);
    }
  }

  return {
    sessionId: ctx.sessionId,
    finalState: ctx.state,
    passed: outcome.state === 'DONE',
    executedSteps,
    skippedSteps,
    toleratedFailures,
    failedStep: outcome.failedStep,
    failureKind: isSetupError(outcome.failure) ? outcome.failure.kind : undefined,
    durationsMs,
  };
}

export function formatRunSummary(summary: RunSummary): string[] {
  const lines = [
    `Run ${summary.sessionId} finished in state ${summary.finalState}`,
    `Executed: ${summary.executedSteps.join(', ') || 'none'}`,
    `Skipped: ${summary.skippedSteps.join(', ') || 'none'}`,
  ];
  if (summary.toleratedFailures.length > 0) {
    lines.push(`Failed without halting: ${summary.toleratedFailures.join(', ')}`);
  }
  if (summary.failedStep) {
    const kind = summary.failureKind ? ` (${summary.failureKind})` : '';
    lines.push(`Halted at: ${summary.failedStep}${kind}`);
  }
  return lines;
}
