import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { format } from "date-fns";
import { MissingFieldsError, crossLedger, reconcile } from "@dispatch/allocation-engine";
import { assertCompleteMapping, mapHeaders, suggestColumnMapping } from "./column-mapper.js";
import { OUTPUT_LABELS, dispatchRows, loadDispatchInputs, writeDispatchWorkbook } from "./dispatch-workbook.js";
import { ledgerRows, readDispatchPlanWorkbook, readLedgerWorkbook } from "./ledger-workbook.js";
import {
  addSiteItemColumns,
  filterByWarehouse,
  listWarehouses,
  loadWarehouseTable,
  upperCaseHeaders,
  writeWarehouseWorkbook
} from "./warehouse-workbook.js";
import {
  SheetNotFoundError,
  WorkbookReadError,
  buildWorkbook,
  describeSheet,
  listSheets,
  readSheetHeaders,
  readSheetRows,
  readWorkbook,
  suggestSheets,
  workbookToBuffer
} from "./workbook.js";

function workbookBuffer(sheets: Array<{ name: string; rows: unknown[][] }>): Buffer {
  return workbookToBuffer(buildWorkbook(sheets));
}

const requestRows = [
  ["Item", "MATERIAL", "Descripcion Material", "CODIGO OBRA SGT", "Planilla", "Planilla Cantidad"],
  ["1", "M-1", "Cable", "OB-1", "1 Norte", 10],
  ["", "", "", "", "", ""],
  ["2", "M-2", "Tubo", "OB-1", "2 Sur", 5]
];

const stockRows = [
  ["MATERIAL", "Descripcion_SAP", "SAP"],
  ["M-1", "Cable SAP", 4]
];

describe("suggestColumnMapping", () => {
  it("matches labels first, then aliases, ignoring case", () => {
    const mapping = suggestColumnMapping("requests", [
      "ITEM",
      "Código material",
      "Texto breve de material",
      "Obra",
      "Planilla",
      "Cantidad"
    ]);

    expect(mapping).toEqual({
      itemId: "ITEM",
      materialCode: "Código material",
      materialDescription: "Texto breve de material",
      siteCode: "Obra",
      planName: "Planilla",
      requestedQty: "Cantidad"
    });
  });

  it("prefers the label over an alias present in the same sheet", () => {
    const mapping = suggestColumnMapping("stock", ["Stock", "SAP", "material"]);
    expect(mapping).toEqual({ availableQty: "SAP", materialCode: "material" });
  });
});

describe("mapHeaders", () => {
  it("renames a row and blanks unmapped optional fields", () => {
    const record = mapHeaders(
      "stock",
      { materialCode: "Codigo", availableQty: "Libre" },
      { Codigo: "M-9", Libre: 7, Otro: "x" }
    );
    expect(record).toEqual({ itemId: "", stockDescription: "", materialCode: "M-9", availableQty: 7 });
  });

  it("leaves a required key absent when its header is not in the row", () => {
    const record = mapHeaders("requests", { materialCode: "MAT", requestedQty: "QTY" }, { MAT: "M-1" });
    expect("requestedQty" in record).toBe(false);
  });
});

describe("assertCompleteMapping", () => {
  it("reports unmapped required fields", () => {
    expect(() => assertCompleteMapping("requests", { materialCode: "MATERIAL" })).toThrow(
      "requests table is missing required fields: requestedQty"
    );
  });

  it("reports required fields mapped to headers the sheet lacks", () => {
    try {
      assertCompleteMapping("stock", { materialCode: "MATERIAL", availableQty: "Libre" }, ["MATERIAL", "SAP"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingFieldsError);
      expect(error).toMatchObject({ table: "stock", fields: ["availableQty"] });
    }
  });
});

describe("workbook reading", () => {
  it("suggests sheets by name, falling back to position", () => {
    expect(suggestSheets(["Resumen", "Material por descargar", "EXISTENCIA SAP"])).toEqual({
      requestSheet: "Material por descargar",
      stockSheet: "EXISTENCIA SAP"
    });
    expect(suggestSheets(["Pedidos", "Bodega"])).toEqual({ requestSheet: "Pedidos", stockSheet: "Bodega" });
    expect(suggestSheets(["Unica"])).toEqual({ requestSheet: "Unica", stockSheet: "Unica" });
  });

  it("names blank and repeated headers", () => {
    const workbook = readWorkbook(
      workbookBuffer([{ name: "Sheet1", rows: [["Qty", "Qty", "", "Note"], [1, 2, 3, "a"]] }])
    );
    expect(readSheetHeaders(workbook, "Sheet1")).toEqual(["Qty", "Qty_1", "__EMPTY", "Note"]);
    expect(readSheetRows(workbook, "Sheet1")).toEqual([{ Qty: 1, Qty_1: 2, __EMPTY: 3, Note: "a" }]);
  });

  it("drops blank rows", () => {
    const workbook = readWorkbook(workbookBuffer([{ name: "Pedidos", rows: requestRows }]));
    expect(readSheetRows(workbook, "Pedidos").map((row) => row["MATERIAL"])).toEqual(["M-1", "M-2"]);
  });

  it("throws SheetNotFoundError with the available sheets", () => {
    const workbook = readWorkbook(workbookBuffer([{ name: "Pedidos", rows: requestRows }]));
    expect(() => readSheetRows(workbook, "Nope")).toThrow(SheetNotFoundError);
    expect(() => readSheetRows(workbook, "Nope")).toThrow('Sheet "Nope" not found. Available sheets: Pedidos');
  });

  it("wraps unreadable files in WorkbookReadError", () => {
    const missing = path.join(os.tmpdir(), "dispatch-missing", "nothing.xlsx");
    expect(() => readWorkbook(missing)).toThrow(WorkbookReadError);
  });

  it("profiles columns from a sample", () => {
    const workbook = readWorkbook(
      workbookBuffer([
        {
          name: "Datos",
          rows: [
            ["Code", "Qty", "Flag", "Blank"],
            ["A", 1, true, ""],
            ["B", "x", false, ""]
          ]
        },
        { name: "Otra", rows: [["x"]] }
      ])
    );

    const profile = describeSheet(workbook, "Datos");

    expect(profile.totalRows).toBe(2);
    expect(profile.totalColumns).toBe(4);
    expect(profile.availableSheets).toEqual(["Datos", "Otra"]);
    expect(profile.columns).toEqual([
      { name: "Code", inferredType: "text", nonBlankCount: 2, blankCount: 0, example: "A" },
      { name: "Qty", inferredType: "mixed", nonBlankCount: 2, blankCount: 0, example: 1 },
      { name: "Flag", inferredType: "boolean", nonBlankCount: 2, blankCount: 0, example: true },
      { name: "Blank", inferredType: "empty", nonBlankCount: 0, blankCount: 2, example: null }
    ]);
  });
});

describe("loadDispatchInputs", () => {
  const buffer = workbookBuffer([
    { name: "Material por descargar", rows: requestRows },
    { name: "Existencia SAP", rows: stockRows }
  ]);

  it("loads both tables with suggested sheets and mappings", () => {
    const inputs = loadDispatchInputs(readWorkbook(buffer));

    expect(inputs.requestSheet).toBe("Material por descargar");
    expect(inputs.stockSheet).toBe("Existencia SAP");
    expect(inputs.stockMapping).toEqual({ stockDescription: "Descripcion_SAP", materialCode: "MATERIAL", availableQty: "SAP" });
    expect(inputs.requests).toHaveLength(2);
    expect(inputs.stock).toEqual([{ itemId: "", stockDescription: "Cable SAP", materialCode: "M-1", availableQty: 4 }]);
  });

  it("feeds reconcile end to end", () => {
    const inputs = loadDispatchInputs(readWorkbook(buffer));
    const result = reconcile(inputs.requests, inputs.stock);

    expect(result.lines.map((line) => [line.materialCode, line.allocatedQty, line.unmetQty, line.dispatchable])).toEqual([
      ["M-1", 4, 0, true],
      ["M-1", 0, 6, false],
      ["M-2", 0, 5, false]
    ]);
    expect(result.lines[0]?.stockDescription).toBe("Cable SAP");
  });

  it("honours explicit sheets and mappings", () => {
    const inputs = loadDispatchInputs(readWorkbook(buffer), {
      requestSheet: "Material por descargar",
      stockSheet: "Existencia SAP",
      stockMapping: { materialCode: "MATERIAL", availableQty: "SAP" }
    });
    expect(inputs.stock).toEqual([{ itemId: "", stockDescription: "", materialCode: "M-1", availableQty: 4 }]);
  });

  it("fails when a required column cannot be resolved", () => {
    const noQty = workbookBuffer([
      { name: "Material por descargar", rows: requestRows },
      { name: "Existencia SAP", rows: [["MATERIAL", "Descripcion_SAP"], ["M-1", "Cable SAP"]] }
    ]);
    expect(() => loadDispatchInputs(readWorkbook(noQty))).toThrow("stock table is missing required fields: availableQty");
  });
});

describe("dispatch export", () => {
  const { lines } = reconcile(
    [{ itemId: "1", materialCode: "M-1", materialDescription: "Cable", siteCode: "OB-1", planName: "1 Norte", requestedQty: 10 }],
    [{ itemId: "1", stockDescription: "Cable SAP", materialCode: "M-1", availableQty: 4 }]
  );

  it("writes labelled rows with Si/No", () => {
    expect(dispatchRows(lines)).toEqual([
      [...OUTPUT_LABELS],
      ["1", "M-1", "Cable", "OB-1", "1 Norte", 10, "Cable SAP", 4, 0, "Si"],
      ["1", "M-1", "Cable", "OB-1", "1 Norte", 10, "Cable SAP", 0, 6, "No"]
    ]);
  });

  it("appends audit columns on request", () => {
    const [header, first, second] = dispatchRows(lines, { includeAuditColumns: true });
    expect(header?.slice(-2)).toEqual(["SAP Antes", "SAP Restante"]);
    expect(first?.slice(-2)).toEqual([4, 0]);
    expect(second?.slice(-2)).toEqual([0, 0]);
  });

  it("round-trips through an xlsx buffer", () => {
    const workbook = readWorkbook(writeDispatchWorkbook(lines));
    expect(listSheets(workbook)).toEqual(["CruceMaterialSAP_Split"]);
    expect(readSheetHeaders(workbook, "CruceMaterialSAP_Split")).toEqual([
      "Item",
      "MATERIAL",
      "Descripcion Material",
      "CODIGO OBRA SGT",
      "Planilla",
      "Planilla Cantidad",
      "Descripcion_SAP",
      "Cantidad Asignada",
      "Diferencia",
      "Descargable"
    ]);
    expect(readSheetRows(workbook, "CruceMaterialSAP_Split").map((row) => row["Descargable"])).toEqual(["Si", "No"]);
  });
});

describe("ledger workbooks", () => {
  const masterRows = [
    ["CODIGO OBRA SGT", "Item", "SALDO", "FECHA DESCAR SGT", "Bodega"],
    ["OB-1", 10, 5, "27/05/2025", "B1"],
    ["OB-2", "20", "-1", "", "B2"]
  ];

  function writeTemp(name: string, buffer: Buffer): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "dispatch-ledger-"));
    const file = path.join(dir, name);
    fs.writeFileSync(file, buffer);
    return file;
  }

  it("reads master entries from a file", () => {
    const file = writeTemp("master.xlsx", workbookBuffer([{ name: "Maestro", rows: masterRows }]));
    const ledger = readLedgerWorkbook(file);

    expect(ledger.sheetName).toBe("Maestro");
    expect(ledger.headers).toEqual(["CODIGO OBRA SGT", "Item", "SALDO", "FECHA DESCAR SGT", "Bodega"]);
    expect(ledger.entries.map((entry) => [entry.siteCode, entry.itemId, entry.balance, entry.extra])).toEqual([
      ["OB-1", "10", 5, { Bodega: "B1" }],
      ["OB-2", "20", -1, { Bodega: "B2" }]
    ]);
    const [first, second] = ledger.entries;
    expect(first?.dispatchDate ? format(first.dispatchDate, "dd/MM/yyyy") : null).toBe("27/05/2025");
    expect(second?.dispatchDate).toBeNull();
  });

  it("rejects a master without a balance column", () => {
    const buffer = workbookBuffer([{ name: "Maestro", rows: [["CODIGO OBRA SGT", "Item"], ["OB-1", 10]] }]);
    expect(() => readLedgerWorkbook(buffer)).toThrow("ledger table is missing required fields: SALDO");
  });

  it("reads the allocated quantity from a dispatch plan", () => {
    const buffer = workbookBuffer([
      {
        name: "CruceMaterialSAP_Split",
        rows: [
          ["Item", "CODIGO OBRA SGT", "Planilla Cantidad", "Cantidad Asignada", "Descargable"],
          ["10", "OB-1", 9, 3, "Si"]
        ]
      }
    ]);
    expect(readDispatchPlanWorkbook(buffer)).toEqual([{ siteCode: "OB-1", itemId: "10", quantity: 3, dispatchable: "Si" }]);
  });

  it("falls back to the requested quantity", () => {
    const buffer = workbookBuffer([
      {
        name: "Plan",
        rows: [
          ["Item", "CODIGO OBRA SGT", "Planilla Cantidad", "Descargable"],
          ["10", "OB-1", 9, "No"]
        ]
      }
    ]);
    expect(readDispatchPlanWorkbook(buffer)).toEqual([{ siteCode: "OB-1", itemId: "10", quantity: 9, dispatchable: "No" }]);
  });

  it("rejects a plan without the Descargable column", () => {
    const buffer = workbookBuffer([{ name: "Plan", rows: [["Item", "CODIGO OBRA SGT", "Cantidad Asignada"], ["10", "OB-1", 3]] }]);
    expect(() => readDispatchPlanWorkbook(buffer)).toThrow("dispatch-plan table is missing required fields: Descargable");
  });

  it("writes crossed entries with stamp columns appended", () => {
    const ledger = readLedgerWorkbook(workbookBuffer([{ name: "Maestro", rows: masterRows }]));
    const result = crossLedger(
      ledger.entries,
      [{ siteCode: "OB-1", itemId: "10", quantity: 3, dispatchable: "Si" }],
      { newWorkOrder: "2060120250200", newJobNumber: "2", observation: "ok" }
    );

    expect(ledgerRows(ledger.headers, result.entries)).toEqual([
      [
        "CODIGO OBRA SGT",
        "Item",
        "SALDO",
        "FECHA DESCAR SGT",
        "Bodega",
        "Cant Desc.",
        "CRUZADO",
        "OBSERVACION",
        "NUEVA OBRA",
        "NUEVO TRABAJO",
        "OBRA - TRAB - ITEM"
      ],
      ["OB-1", "10", 2, "27/05/2025", "B1", 3, "NO", "ok", "2060120250200", "02", "206012025020002-10"],
      ["OB-2", "20", -1, "", "B2", "", "", "", "", "", ""]
    ]);
  });
});

describe("warehouse export", () => {
  const movements = readWorkbook(
    workbookBuffer([
      {
        name: "Movimientos",
        rows: [
          ["Material", "Texto cab.documento", "Item", "Almacén", "Cantidad"],
          ["M-1", "OT 20701202210000220 entrega", "1110073", "A01", 5],
          ["M-2", "sin numero", "1110074", "B02", 3],
          ["M-3", "20701202210000221", "", "A01", 2]
        ]
      }
    ])
  );

  it("upper-cases headers and derives the site-item columns", () => {
    const table = loadWarehouseTable(movements);

    expect(table.sheetName).toBe("Movimientos");
    expect(table.headers).toEqual([
      "MATERIAL",
      "TEXTO CAB.DOCUMENTO",
      "ITEM",
      "ALMACÉN",
      "CANTIDAD",
      "OBRA Y TRABAJO",
      "Obra-item"
    ]);
    expect(table.rows.map((row) => [row["OBRA Y TRABAJO"], row["Obra-item"]])).toEqual([
      ["207012022100002-20", "20701202210000220-1110073"],
      ["", ""],
      ["207012022100002-21", ""]
    ]);
  });

  it("suffixes headers that fold together when upper-cased", () => {
    const table = upperCaseHeaders({ sheetName: "S", headers: ["Item", "ITEM"], rows: [{ Item: "a", ITEM: "b" }] });
    expect(table.headers).toEqual(["ITEM", "ITEM_1"]);
    expect(table.rows).toEqual([{ ITEM: "a", ITEM_1: "b" }]);
  });

  it("skips the item column when the sheet has none", () => {
    const table = addSiteItemColumns({
      sheetName: "S",
      headers: ["TEXTO CAB.DOCUMENTO"],
      rows: [{ "TEXTO CAB.DOCUMENTO": "20701202210000220" }]
    });
    expect(table.headers).toEqual(["TEXTO CAB.DOCUMENTO", "OBRA Y TRABAJO"]);
    expect(table.rows).toEqual([{ "TEXTO CAB.DOCUMENTO": "20701202210000220", "OBRA Y TRABAJO": "207012022100002-20" }]);
  });

  it("filters rows to one warehouse", () => {
    const table = loadWarehouseTable(movements);

    expect(listWarehouses(table)).toEqual(["A01", "B02"]);
    expect(filterByWarehouse(table, "A01").rows.map((row) => row["MATERIAL"])).toEqual(["M-1", "M-3"]);
    expect(filterByWarehouse(table, " ").rows).toHaveLength(3);
  });

  it("keeps every row when the sheet has no warehouse column", () => {
    const table = { sheetName: "S", headers: ["MATERIAL"], rows: [{ MATERIAL: "M-1" }, { MATERIAL: "M-2" }] };
    expect(listWarehouses(table)).toEqual([]);
    expect(filterByWarehouse(table, "A01").rows).toEqual(table.rows);
  });

  it("writes the filtered rows to Sheet1", () => {
    const filtered = filterByWarehouse(loadWarehouseTable(movements), "A01");
    const written = readWorkbook(writeWarehouseWorkbook(filtered));

    expect(listSheets(written)).toEqual(["Sheet1"]);
    expect(readSheetHeaders(written, "Sheet1")).toEqual(filtered.headers);
    expect(readSheetRows(written, "Sheet1").map((row) => [row["MATERIAL"], row["CANTIDAD"], row["Obra-item"]])).toEqual([
      ["M-1", 5, "20701202210000220-1110073"],
      ["M-3", 2, ""]
    ]);
  });
});
