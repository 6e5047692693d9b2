/** Column names of the password-manager CSV export this tool understands. */
export const FIELDS = {
  name: 'name',
  uri: 'login_uri',
  username: 'login_username',
  password: 'login_password',
  totp: 'login_totp',
  notes: 'notes',
  folder: 'folder',
  type: 'type',
} as const;

export type FieldName = typeof FIELDS[keyof typeof FIELDS];

export const REQUIRED_FIELDS: readonly FieldName[] = [
  FIELDS.name,
  FIELDS.uri,
  FIELDS.username,
  FIELDS.password,
  FIELDS.totp,
  FIELDS.notes,
  FIELDS.folder,
  FIELDS.type,
];

export const LOGIN_TYPE = 'login';

/**
 * One row of the export. Columns beyond the known fields are carried as-is.
 * A missing column and an empty value mean the same thing.
 */
export type ExportRecord = Readonly<Record<string, string>>;

export interface ParsedExport {
  /** Header row in file order; output is written back in this order. */
  headers: string[];
  records: ExportRecord[];
}
