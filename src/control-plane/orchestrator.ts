import { loadSettings, type SetupSettings } from '../config/settings.js';
import { buildRunSummary, formatRunSummary } from '../ledger/ledger.js';
import { Logger, consoleDisplay, sessionLogPath, type DisplaySink } from '../logging/logger.js';
import { createTerminalInput, type InputPort } from '../prompt/input.js';
import { ExternalTools } from '../tools/commands.js';
import { execCmd, type CommandRunner } from '../tools/process.js';
import { generateSessionId } from '../utils/id.js';
import { StepTimer } from '../utils/timer.js';
import { describeFailure } from './errors.js';
import { finish } from './exit.js';
import { buildPipeline, createExecutionContext } from './workflow.js';
import type { ExecutionContext, PipelineOutcome, PipelineStep } from './types.js';

/**
 * Runs steps in order. A skipped step and a failed best-effort step still
 * advance the state; the first fatal failure moves to FAILED and nothing
 * after it runs.
 */
export async function runPipeline(
  ctx: ExecutionContext,
  steps: PipelineStep[],
  logger: Logger
): Promise<PipelineOutcome> {
  const timer = new StepTimer();

  for (const step of steps) {
    timer.begin();

    try {
      const skipReason = step.skipWhen ? await step.skipWhen(ctx) : undefined;
      if (skipReason !== undefined) {
        ctx.stepResults.push({ name: step.name, status: 'skipped', durationMs: timer.elapsedMs(), detail: skipReason });
        ctx.state = step.reaches;
        logger.info(`[skip] ${step.title}: ${skipReason}`);
        continue;
      }

      logger.info(`[run]  ${step.title}...`);
      await step.execute(ctx);
      const duration = timer.elapsedMs();
      ctx.stepResults.push({ name: step.name, status: 'passed', durationMs: duration });
      ctx.state = step.reaches;
      logger.info(`[pass] ${step.title} (${duration}ms)`);
    } catch (err) {
      const message = describeFailure(err);
      ctx.stepResults.push({ name: step.name, status: 'failed', durationMs: timer.elapsedMs(), detail: message });

      if (step.policy === 'best-effort') {
        ctx.state = step.reaches;
        logger.warn(`[warn] ${step.title}: ${message}. Continuing.`);
        continue;
      }

      ctx.state = 'FAILED';
      logger.error(`[FAIL] ${step.title}: ${message}`);
      return {
        state: 'FAILED',
        exitCode: 1,
        failedStep: step.name,
        failure: err instanceof Error ? err : new Error(message),
      };
    }
  }

  ctx.state = 'DONE';
  logger.info('Setup completed successfully.');
  return { state: 'DONE', exitCode: 0 };
}

export interface SetupRuntime {
  settings: SetupSettings;
  runner: CommandRunner;
  input: InputPort;
  display: DisplaySink;
  logDir?: string;
  waitForKeypress: boolean;
}

export async function runSetup(overrides: Partial<SetupRuntime> = {}): Promise<number> {
  const settings = overrides.settings ?? loadSettings();
  const runner = overrides.runner ?? execCmd;
  const input = overrides.input ?? createTerminalInput();
  const waitForKeypress = overrides.waitForKeypress ?? process.stdin.isTTY === true;

  const sessionId = generateSessionId();
  const logger = new Logger(sessionLogPath(sessionId, overrides.logDir), overrides.display ?? consoleDisplay);
  const ctx = createExecutionContext(settings, logger.filePath, sessionId);
  const tools = new ExternalTools(runner, logger, settings);

  logger.info(`devsetup session ${sessionId} in ${settings.cwd}`);
  logger.info(`Logging to ${logger.filePath}`);

  const outcome = await runPipeline(ctx, buildPipeline({ settings, tools, runner, logger, input }), logger);

  for (const line of formatRunSummary(buildRunSummary(ctx, outcome))) {
    logger.info(line);
  }

  return finish(ctx, outcome.exitCode, waitForKeypress, { logger, input, tools });
}
