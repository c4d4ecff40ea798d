import type { RequestField, StockField } from "@dispatch/contracts";

/** A cell as read from a sheet with `cellDates` on. Blank cells read as "". */
export type SheetCell = string | number | boolean | Date | null;

export type SheetRow = Record<string, SheetCell>;

/** Either a path on disk or the bytes of an uploaded file. */
export type WorkbookSource = string | Buffer;

export type TableFields = {
  requests: RequestField;
  stock: StockField;
};

export type MappingTable = keyof TableFields;

/** Canonical field → source header chosen for it. */
export type ColumnMapping<T extends MappingTable> = Partial<Record<TableFields[T], string>>;

export type CanonicalRecord<T extends MappingTable> = Partial<Record<TableFields[T], SheetCell>>;

export type SheetSuggestion = {
  requestSheet: string;
  stockSheet: string;
};
