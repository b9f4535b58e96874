import fs from "fs/promises";
import path from "path";
import { csvFormat } from "d3-dsv";
import { WeatherTable } from "../interfaces/weatherRow";
import { IOFailureError } from "../errors";

export function toCsv(table: WeatherTable): string {
  return `${csvFormat(table.rows, [...table.columns])}\n`;
}

/**
 * `<outputDir>/<location>.csv`; separators in the location become `_` so the
 * file stays inside outputDir.
 */
export function csvPathFor(outputDir: string, location: string): string {
  return path.join(outputDir, `${location.replace(/[\\/]/g, "_")}.csv`);
}

/**
 * Writes the table, replacing any existing file. Resolves with the path.
 */
export async function writeCsv(
  table: WeatherTable,
  outputDir: string,
  location: string
): Promise<string> {
  const filePath = csvPathFor(outputDir, location);

  try {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(filePath, toCsv(table), "utf8");
  } catch (err) {
    throw new IOFailureError(filePath, { cause: err });
  }

  return filePath;
}
