import { promises as fs } from "fs";
import { Workbook } from "exceljs";

export type SheetColumn = { header: string; key: string; width: number };
export type SheetRow = Record<string, string | number>;

export const writeWorkbook = async (
  filePath: string,
  sheetName: string,
  columns: SheetColumn[],
  rows: SheetRow[]
): Promise<void> => {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.columns = columns;
  sheet.addRows(rows);
  await workbook.xlsx.writeFile(filePath);
};

export const writeJson = async (filePath: string, payload: unknown): Promise<void> => {
  await fs.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
};
