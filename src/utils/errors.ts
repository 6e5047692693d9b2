export class MissingFieldsError extends Error {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Input CSV is missing required fields: ${fields.join(', ')}`);
    this.name = 'MissingFieldsError';
    this.fields = fields;
  }
}

export class ExportFileError extends Error {
  readonly path: string;

  constructor(action: 'read' | 'write', path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Error ${action === 'read' ? 'reading input' : 'writing output'} file ${path}: ${detail}`);
    this.name = 'ExportFileError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
