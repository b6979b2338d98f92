export class MissingCredentialError extends Error {
  constructor(message = 'GITHUB_TOKEN is required. Pass --token or set it in the environment or a .env file.') {
    super(message);
    this.name = 'MissingCredentialError';
  }
}

/** Raised when asked to save zero records: no header can be derived. */
export class EmptyRecordSetError extends Error {
  constructor(target: string) {
    super(`Refusing to write ${target}: no records to derive a header from.`);
    this.name = 'EmptyRecordSetError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
