/**
 * Structured tool error taxonomy.
 * Every failed tool call is rendered through toToolResult() so the model sees
 * a stable `code=` / `retryable=` header it can act on.
 */

export type ToolErrorCode =
  | 'invalid_args' // wrong types, missing params, unparseable arguments
  | 'not_found' // file/directory doesn't exist, search text absent
  | 'conflict' // ambiguous edit, target exists
  | 'permission' // outside allowed roots, or filesystem EACCES
  | 'timeout'
  | 'internal'; // unexpected error in a handler

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly hint?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ToolError';
  }

  toToolResult(): string {
    const lines = [`ERROR: code=${this.code} retryable=${this.retryable}`, `msg=${this.message}`];

    if (this.hint) lines.push(`hint=${this.hint}`);

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([k, v]) => `${k}=${String(JSON.stringify(v)).slice(0, 200)}`)
        .join(' ');
      lines.push(`details=${detailsStr}`);
    }

    return lines.join('\n');
  }

  /** Wrap anything thrown by a handler, inferring a code from errno or message. */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolError {
    if (err instanceof ToolError) return err;

    const message = err instanceof Error ? err.message : String(err);
    const errno = err instanceof Error && 'code' in err ? String(err.code) : '';

    if (errno === 'ENOENT' || errno === 'ENOTDIR' || message.includes('not found')) {
      return new ToolError('not_found', message);
    }
    if (errno === 'EACCES' || errno === 'EPERM' || message.includes('permission denied')) {
      return new ToolError('permission', message);
    }
    if (errno === 'ETIMEDOUT' || message.includes('timeout')) {
      return new ToolError('timeout', message, true);
    }
    if (errno === 'EEXIST' || errno === 'EISDIR' || message.includes('already exists')) {
      return new ToolError('conflict', message);
    }
    return new ToolError(defaultCode, message);
  }
}

export type FieldError = { field: string; message: string; value?: unknown };

/** Argument validation failure with field-level details. */
export class ValidationError extends ToolError {
  constructor(public readonly errors: FieldError[]) {
    super(
      'invalid_args',
      `Validation failed: ${errors.map((e) => e.message).join('; ')}`,
      false,
      undefined,
      { fields: errors.map((e) => e.field) }
    );
    this.name = 'ValidationError';
  }

  override toToolResult(): string {
    const lines = [`ERROR: code=invalid_args retryable=false`];
    for (const err of this.errors) {
      lines.push(`- ${err.field}: ${err.message}`);
    }
    if (this.errors.some((e) => e.field === 'line_number')) {
      lines.push(`HINT: use read_file to pick a valid line number`);
    }
    return lines.join('\n');
  }
}
