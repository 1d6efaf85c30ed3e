export interface DecodeIssue {
  /** Location of the failing value, e.g. `record 3.price`. Empty for the whole input. */
  readonly path: string;
  readonly message: string;
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly issues: readonly DecodeIssue[] };

export function decoded<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function decodeFailed<T>(issues: readonly DecodeIssue[]): DecodeResult<T> {
  return { ok: false, issues };
}

/** Prefix every issue path with `prefix`. */
export function prefixIssues(prefix: string, issues: readonly DecodeIssue[]): DecodeIssue[] {
  return issues.map((issue) => ({
    path: issue.path === '' ? prefix : `${prefix}.${issue.path}`,
    message: issue.message,
  }));
}

export function formatIssues(issues: readonly DecodeIssue[]): string {
  return issues.map((issue) => (issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`)).join('; ');
}
