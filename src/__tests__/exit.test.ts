import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { loadSettings } from '../config/settings.js';
import { finish } from '../control-plane/exit.js';
import { createExecutionContext } from '../control-plane/workflow.js';
import type { ExecutionContext } from '../control-plane/types.js';
import { Logger } from '../logging/logger.js';
import { ExternalTools } from '../tools/commands.js';
import {
  captureDisplay,
  createFakeRunner,
  createScriptedInput,
  createTempProject,
  type FakeRunner,
  type TempProject,
} from './test-helpers.js';

describe('finish', () => {
  let project: TempProject;
  let logger: Logger;
  let fake: FakeRunner;
  let tools: ExternalTools;
  let ctx: ExecutionContext;

  beforeEach(() => {
    project = createTempProject([]);
    const settings = loadSettings({}, 'posix', project.root);
    logger = new Logger(join(project.root, 'devsetup_exit.log'), captureDisplay().sink);
    fake = createFakeRunner();
    tools = new ExternalTools(fake.runner, logger, settings);
    ctx = createExecutionContext(settings, logger.filePath, 'exit-test');
    ctx.environmentActive = true;
  });

  afterEach(() => project.cleanup());

  it('offers the log on failure and opens it on Y', async () => {
    const input = createScriptedInput(['Y']);
    const code = await finish(ctx, 1, true, { logger, input, tools });

    expect(code).toBe(1);
    expect(fake.lines()).toEqual([`xdg-open ${ctx.logFile}`]);
    expect(project.logLines()).toContain('PROMPT: Do you want to open the log file? (Y/N)');
  });

  it('accepts a lowercase y', async () => {
    const input = createScriptedInput(['y']);
    await finish(ctx, 1, false, { logger, input, tools });
    expect(fake.calls).toHaveLength(1);
  });

  it('takes only a bare y as consent', async () => {
    const input = createScriptedInput([' y']);
    await finish(ctx, 1, false, { logger, input, tools });
    expect(fake.calls).toEqual([]);
  });

  it('leaves the log closed on any other answer', async () => {
    const input = createScriptedInput(['no']);
    const code = await finish(ctx, 1, true, { logger, input, tools });

    expect(code).toBe(1);
    expect(fake.calls).toEqual([]);
    expect(project.logLines()).toContain(`INFO: Log file: ${ctx.logFile}`);
  });

  it('warns when the viewer cannot be started', async () => {
    fake = createFakeRunner(() => ({ exitCode: 3 }));
    tools = new ExternalTools(fake.runner, logger, loadSettings({}, 'posix', project.root));
    await finish(ctx, 1, false, { logger, input: createScriptedInput(['y']), tools });

    expect(project.logLines()).toContain(`WARNING: Could not open a viewer; the log is at ${ctx.logFile}`);
  });

  it('waits for one line on success when asked to', async () => {
    const input = createScriptedInput([]);
    const code = await finish(ctx, 0, true, { logger, input, tools });

    expect(code).toBe(0);
    expect(input.questions).toEqual(['Press Enter to exit...']);
    expect(fake.calls).toEqual([]);
  });

  it('returns immediately on success without waiting', async () => {
    const input = createScriptedInput([]);
    await finish(ctx, 0, false, { logger, input, tools });
    expect(input.questions).toEqual([]);
  });

  it('releases the environment and closes input on every path', async () => {
    const input = createScriptedInput(['n']);
    await finish(ctx, 1, false, { logger, input, tools });

    expect(ctx.environmentActive).toBe(false);
    expect(input.closed).toBe(true);
    expect(project.logLines()[0]).toBe(`INFO: Released virtual environment ${ctx.envDir}`);
  });
});
