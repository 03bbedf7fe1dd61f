export type ContractErrorReason = 'CONTRACT_PARSE_ERROR' | 'CONTRACT_INVALID';

export class ContractError extends Error {
  readonly reason: ContractErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: ContractErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ContractError';
    this.reason = reason;
    this.details = details;
  }
}

export type ExecutorRegistryErrorReason = 'EXECUTOR_UNKNOWN' | 'EXECUTOR_DUPLICATE';

export class ExecutorRegistryError extends Error {
  readonly reason: ExecutorRegistryErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: ExecutorRegistryErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ExecutorRegistryError';
    this.reason = reason;
    this.details = details;
  }
}

/** Isolate process exit codes. */
export const IsolateExit = {
  SUCCESS: 0,
  TEST_FAILURE: 1,
  PATH_FAILURE: 2,
  PARSE_ERROR: 3,
  NO_PROJECT_ROOT: 4,
  INVALID_PATH: 5
} as const;

export type IsolateExitCode = (typeof IsolateExit)[keyof typeof IsolateExit];

export type IsolateErrorReason = 'ISOLATE_PARSE_ERROR' | 'ISOLATE_NO_PROJECT_ROOT' | 'ISOLATE_INVALID_PATH' | 'ISOLATE_SETUP_FAILED';

const EXIT_FOR_REASON: Record<IsolateErrorReason, IsolateExitCode> = {
  ISOLATE_PARSE_ERROR: IsolateExit.PARSE_ERROR,
  ISOLATE_NO_PROJECT_ROOT: IsolateExit.NO_PROJECT_ROOT,
  ISOLATE_INVALID_PATH: IsolateExit.INVALID_PATH,
  ISOLATE_SETUP_FAILED: IsolateExit.INVALID_PATH
};

export class IsolateError extends Error {
  readonly reason: IsolateErrorReason;
  readonly exitCode: IsolateExitCode;
  readonly details?: Record<string, unknown>;

  constructor(reason: IsolateErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'IsolateError';
    this.reason = reason;
    this.exitCode = EXIT_FOR_REASON[reason];
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type AnalyzeErrorReason =
  | 'ANALYZE_SOURCE_NOT_FOUND'
  | 'ANALYZE_UNSUPPORTED_SOURCE'
  | 'ANALYZE_NOT_FOUND'
  | 'ANALYZE_INVALID'
  | 'ANALYZE_TYPE_MISMATCH';

export class AnalyzeError extends Error {
  readonly reason: AnalyzeErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: AnalyzeErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AnalyzeError';
    this.reason = reason;
    this.details = details;
  }
}
