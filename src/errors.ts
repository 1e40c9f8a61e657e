export type ParseErrorKind = 'filesystem' | 'parse' | 'mapping';

export interface ParseErrorInit {
  file: string;
  kind: ParseErrorKind;
  reason: string;
  line?: number;
  column?: number;
}

/**
 * Per-file diagnostic. `message` is the rendered form:
 * `path:line:col: reason` when the location is known, else `path: reason`.
 */
export class DetailedParseError extends Error {
  readonly file: string;
  readonly kind: ParseErrorKind;
  readonly reason: string;
  readonly line: number;
  readonly column: number;

  constructor(init: ParseErrorInit) {
    const line = init.line ?? 0;
    const column = init.column ?? 0;
    super(renderParseError(init.file, line, column, init.reason));
    this.name = 'DetailedParseError';
    this.file = init.file;
    this.kind = init.kind;
    this.reason = init.reason;
    this.line = line;
    this.column = column;
  }
}

export function renderParseError(file: string, line: number, column: number, reason: string): string {
  if (line > 0) {
    return `${file}:${line}:${column}: ${reason}`;
  }
  return `${file}: ${reason}`;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
