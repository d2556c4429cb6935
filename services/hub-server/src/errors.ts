export type HubErrorCode =
  | 'REPO_NOT_FOUND'
  | 'ENTRY_NOT_FOUND'
  | 'OUT_OF_BOUNDS'
  | 'IO_ERROR'
  | 'INVALID_REQUEST';

export class HubError extends Error {
  public readonly code: HubErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: HubErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HubError';
    this.code = code;
    this.details = details;
  }
}

export function isHubError(err: unknown, code?: HubErrorCode): err is HubError {
  return err instanceof HubError && (code === undefined || err.code === code);
}

export function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) {
    return false;
  }
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
