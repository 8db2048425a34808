export type PipelineState =
  | 'START'
  | 'INTERPRETER_CHECKED'
  | 'ENV_READY'
  | 'SOURCE_SYNCED'
  | 'NATIVE_LIB_READY'
  | 'DEPS_SELECTED'
  | 'DEPS_INSTALLED'
  | 'APP_INSTALLED'
  | 'UI_DECIDED'
  | 'DONE'
  | 'FAILED';

export type StepName =
  | 'check_interpreter'
  | 'create_environment'
  | 'sync_source'
  | 'install_native_library'
  | 'select_dependencies'
  | 'install_dependencies'
  | 'install_application'
  | 'decide_ui';

export type FailurePolicy = 'fatal' | 'best-effort';

export type StepStatus = 'passed' | 'skipped' | 'failed';

export interface StepResult {
  name: StepName;
  status: StepStatus;
  durationMs: number;
  detail?: string;
}

export interface ExecutionContext {
  cwd: string;
  envDir: string;
  logFile: string;
  sessionId: string;
  interpreterPath?: string;
  interpreterVersion?: string;
  selectedManifests: string[];
  environmentActive: boolean;
  state: PipelineState;
  stepResults: StepResult[];
}

export interface PipelineStep {
  name: StepName;
  title: string;
  reaches: PipelineState;
  policy: FailurePolicy;
  /** Resolves to a reason when the step's effect is already present or must not be applied. */
  skipWhen?: (ctx: ExecutionContext) => Promise<string | undefined>;
  execute: (ctx: ExecutionContext) => Promise<void>;
}

export interface PipelineOutcome {
  state: 'DONE' | 'FAILED';
  exitCode: 0 | 1;
  failedStep?: StepName;
  failure?: Error;
}
