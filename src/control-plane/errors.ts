export type SetupErrorKind =
  | 'InterpreterNotFound'
  | 'EnvironmentCreationFailed'
  | 'SyncFailed'
  | 'NativeLibraryInstallFailed'
  | 'ManifestNotFound'
  | 'DependencyInstallFailed'
  | 'ApplicationInstallFailed'
  | 'InvalidSelection'
  | 'UiInstallFailed';

export class SetupError extends Error {
  readonly kind: SetupErrorKind;

  constructor(kind: SetupErrorKind, message: string) {
    super(message);
    this.name = 'SetupError';
    this.kind = kind;
  }
}

export function isSetupError(err: unknown): err is SetupError {
  return err instanceof SetupError;
}

export function describeFailure(err: unknown): string {
  if (isSetupError(err)) return `${err.kind}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}
