import { Readable } from 'stream';
import csv from 'csv-parser';

export interface CsvContent {
  headers: string[] | undefined;  // undefined when the input has no header line
  rows: Record<string, string>[];
}

/**
 * Parse CSV text with a header line into row records keyed by header.
 */
export async function readCsv(content: string): Promise<CsvContent> {
  let headers: string[] | undefined;
  const rows: Record<string, string>[] = [];

  await new Promise<void>((resolve, reject) => {
    Readable.from([content])
      .pipe(csv())
      .on('headers', (names: string[]) => {
        headers = names;
      })
      .on('data', (row: Record<string, string>) => {
        rows.push(row);
      })
      .on('end', resolve)
      .on('error', reject);
  });

  return { headers, rows };
}
