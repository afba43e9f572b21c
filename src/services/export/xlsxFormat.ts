import { Workbook, type CellValue, type Worksheet } from "exceljs";

import { EXPORT_HEADERS, type ExportDocument } from "../../types/exportTypes";
import type { Sample } from "../../types/sessionTypes";
import { flattenConfig, unflattenConfig, type FlatValue } from "../config/sessionConfig";
import { ExportError } from "../utils/errors";
import { sampleFromRow, sampleRow, sessionInfoEntries, sessionInfoFrom } from "./metadata";


// Sheets: Data (samples), Settings (key/value; full notes under "notes"), Notes (one line per row)
const SHEET_DATA = "Data";
const SHEET_SETTINGS = "Settings";
const SHEET_NOTES = "Notes";
const SESSION_PREFIX = "session.";


export function buildWorkbook(doc: ExportDocument): Workbook {
   const { config, notes, session } = doc.metadata;
   const wb = new Workbook();
   wb.created = new Date(session.exportedAt || Date.now());

   const data = wb.addWorksheet(SHEET_DATA);
   data.addRow([...EXPORT_HEADERS]);
   for (const s of doc.samples) data.addRow(sampleRow(s));

   const settings = wb.addWorksheet(SHEET_SETTINGS);
   settings.addRow(["Key", "Value"]);
   for (const [k, v] of flattenConfig(config)) settings.addRow([k, v]);
   for (const [k, v] of sessionInfoEntries(session)) settings.addRow([SESSION_PREFIX + k, v]);
   settings.addRow(["notes", notes]);

   const notesWs = wb.addWorksheet(SHEET_NOTES);
   notesWs.addRow(["Notes"]);
   for (const line of notes.split("\n")) notesWs.addRow([line]);

   return wb;
}

export async function writeXlsxExport(path: string, doc: ExportDocument): Promise<void> {
   await buildWorkbook(doc).xlsx.writeFile(path);
}



// ───────────────────────────────────────────────────────────────────────────────
// Reading back
// ───────────────────────────────────────────────────────────────────────────────
function requireSheet(wb: Workbook, name: string): Worksheet {
   const ws = wb.getWorksheet(name);
   if (!ws) throw new Error(`missing sheet "${name}"`);
   return ws;
}

function toFlat(v: CellValue): FlatValue {
   if (v === null || v === undefined) return "";
   if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
   if (typeof v === "object" && "richText" in v) return v.richText.map((r) => r.text).join("");
   return String(v);
}

function toNumber(v: CellValue, where: string): number {
   if (typeof v === "number") return v;
   throw new Error(`${where}: expected a number`);
}

export function parseWorkbook(wb: Workbook): ExportDocument {
   const samples: Sample[] = [];
   requireSheet(wb, SHEET_DATA).eachRow((row, rowNo) => {
      if (rowNo === 1) return;
      const at = (col: number) => row.getCell(col).value;
      const where = `Data!row ${rowNo}`;
      const r = at(5);
      samples.push(
         sampleFromRow(
            toNumber(at(1), where),
            toNumber(at(2), where),
            toNumber(at(3), where),
            toNumber(at(4), where),
            r === null || r === undefined ? undefined : toNumber(r, where)
         )
      );
   });

   const configEntries: Array<[string, FlatValue]> = [];
   const sessionEntries = new Map<string, FlatValue>();
   let notes = "";
   requireSheet(wb, SHEET_SETTINGS).eachRow((row, rowNo) => {
      if (rowNo === 1) return;
      const key = String(toFlat(row.getCell(1).value));
      const value = toFlat(row.getCell(2).value);
      if (key === "notes") notes = String(value);
      else if (key.startsWith(SESSION_PREFIX)) sessionEntries.set(key.slice(SESSION_PREFIX.length), value);
      else configEntries.push([key, value]);
   });

   return {
      metadata: {
         config: unflattenConfig(configEntries, notes),
         notes,
         session: sessionInfoFrom(sessionEntries),
      },
      samples,
   };
}

export async function readXlsxExport(path: string): Promise<ExportDocument> {
   try {
      const wb = new Workbook();
      await wb.xlsx.readFile(path);
      return parseWorkbook(wb);
   } catch (err) {
      throw new ExportError("xlsx", path, `Cannot read spreadsheet export: ${String(err)}`, { cause: err });
   }
}
