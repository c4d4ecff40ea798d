import fs from "node:fs";
import { z } from "zod";
import {
  requestFields,
  requiredRequestFields,
  requiredStockFields,
  stockFields
} from "@dispatch/contracts";
import { MissingFieldsError } from "@dispatch/allocation-engine";
import type { CanonicalRecord, ColumnMapping, MappingTable, SheetRow, TableFields } from "./types.js";

const fieldSpecSchema = z.object({
  label: z.string().min(1),
  aliases: z.array(z.string().min(1))
});

const headerAliasesSchema = z.object({
  requests: z.object({
    itemId: fieldSpecSchema,
    materialCode: fieldSpecSchema,
    materialDescription: fieldSpecSchema,
    siteCode: fieldSpecSchema,
    planName: fieldSpecSchema,
    requestedQty: fieldSpecSchema
  }),
  stock: z.object({
    itemId: fieldSpecSchema,
    stockDescription: fieldSpecSchema,
    materialCode: fieldSpecSchema,
    availableQty: fieldSpecSchema
  })
});

export type FieldSpec = z.infer<typeof fieldSpecSchema>;

export const CANONICAL_FIELDS: { [K in MappingTable]: Record<TableFields[K], FieldSpec> } = headerAliasesSchema.parse(
  JSON.parse(fs.readFileSync(new URL("./data/header-aliases.json", import.meta.url), "utf8"))
);

const TABLE_FIELDS: { [K in MappingTable]: readonly TableFields[K][] } = {
  requests: requestFields,
  stock: stockFields
};

const REQUIRED_FIELDS: { [K in MappingTable]: readonly TableFields[K][] } = {
  requests: requiredRequestFields,
  stock: requiredStockFields
};

export function canonicalFields<T extends MappingTable>(table: T): readonly TableFields[T][] {
  return TABLE_FIELDS[table];
}

export function isRequiredField<T extends MappingTable>(table: T, field: TableFields[T]): boolean {
  return REQUIRED_FIELDS[table].some((required) => required === field);
}

/** Export label of a canonical field ("materialCode" → "MATERIAL"). */
export function fieldLabel<T extends MappingTable>(table: T, field: TableFields[T]): string {
  const specs: Record<TableFields[T], FieldSpec> = CANONICAL_FIELDS[table];
  return specs[field].label;
}

function findHeader(headers: readonly string[], candidates: readonly string[]): string | undefined {
  for (const candidate of candidates) {
    const exact = headers.find((header) => header === candidate);
    if (exact !== undefined) return exact;
    const lowered = candidate.toLowerCase();
    const loose = headers.find((header) => header.toLowerCase() === lowered);
    if (loose !== undefined) return loose;
  }
  return undefined;
}

/**
 * Default header for each canonical field: the export label first, then each
 * known alias, exact before case-insensitive. Fields with no match are left out.
 */
export function suggestColumnMapping<T extends MappingTable>(table: T, headers: readonly string[]): ColumnMapping<T> {
  const specs: Record<TableFields[T], FieldSpec> = CANONICAL_FIELDS[table];
  const mapping: ColumnMapping<T> = {};
  for (const field of canonicalFields(table)) {
    const spec = specs[field];
    const header = findHeader(headers, [spec.label, ...spec.aliases]);
    if (header !== undefined) mapping[field] = header;
  }
  return mapping;
}

/**
 * Required fields must be mapped, and when the sheet's headers are known the
 * mapped header must be one of them.
 */
export function assertCompleteMapping<T extends MappingTable>(
  table: T,
  mapping: ColumnMapping<T>,
  headers?: readonly string[]
): void {
  const missing = REQUIRED_FIELDS[table].filter((field) => {
    const header = mapping[field];
    if (header === undefined) return true;
    return headers !== undefined && !headers.includes(header);
  });
  if (missing.length > 0) {
    throw new MissingFieldsError(table, [...missing]);
  }
}

/**
 * Rename one sheet row to canonical keys. Unmapped optional fields read as
 * blank; a mapped header the row lacks leaves the key absent.
 */
export function mapHeaders<T extends MappingTable>(table: T, mapping: ColumnMapping<T>, row: SheetRow): CanonicalRecord<T> {
  const record: CanonicalRecord<T> = {};
  for (const field of canonicalFields(table)) {
    const header = mapping[field];
    if (header === undefined) {
      if (!isRequiredField(table, field)) record[field] = "";
      continue;
    }
    if (header in row) record[field] = row[header];
  }
  return record;
}
