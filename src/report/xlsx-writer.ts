import path from "node:path";

import ExcelJS from "exceljs";
import fse from "fs-extra";

import { ReportError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import type { SheetData } from "./sheets.js";

export async function writeWorkbook(outputPath: string, sheets: SheetData[]): Promise<string> {
  const resolved = path.resolve(outputPath);
  const workbook = new ExcelJS.Workbook();

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    worksheet.columns = sheet.columns.map((column) => ({ header: column.header, width: column.width }));
    worksheet.addRows(sheet.rows);

    sheet.columns.forEach((column, index) => {
      if (!column.wrap) return;
      worksheet.getColumn(index + 1).alignment = { wrapText: true, vertical: "top" };
    });
  }

  try {
    await fse.ensureDir(path.dirname(resolved));
    await workbook.xlsx.writeFile(resolved);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.report,
      title: "Report could not be written.",
      message: `Failed to write report to ${resolved}.`,
      hint: "Check that the output directory is writable and the file is not open elsewhere.",
      cause: new ReportError(`Workbook write failed for ${resolved}`, err),
    });
  }

  return resolved;
}
