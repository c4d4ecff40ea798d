import type { TableKind } from "@dispatch/contracts";

/**
 * A required canonical field is absent from an input table after column
 * mapping. This is a configuration error: no partial output is produced.
 */
export class MissingFieldsError extends Error {
  readonly code = "MISSING_REQUIRED_FIELDS";
  readonly table: TableKind;
  readonly fields: string[];

  constructor(table: TableKind, fields: string[]) {
    super(`${table} table is missing required fields: ${fields.join(", ")}`);
    this.name = "MissingFieldsError";
    this.table = table;
    this.fields = fields;
  }
}

export function isMissingFieldsError(error: unknown): error is MissingFieldsError {
  return error instanceof MissingFieldsError;
}
