import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { Workbook } from 'exceljs';
import { PlaceRecord, RecordBatch, RecordSink } from '../types/scrape';

export type ExportRow = Record<ExportColumn, string | number | null>;

type ExportColumn =
  | 'name'
  | 'address'
  | 'website'
  | 'phone_number'
  | 'reviews_count'
  | 'reviews_average'
  | 'latitude'
  | 'longitude';

export const EXPORT_COLUMNS: readonly ExportColumn[] = [
  'name',
  'address',
  'website',
  'phone_number',
  'reviews_count',
  'reviews_average',
  'latitude',
  'longitude',
];

export const WORKSHEET_NAME = 'places';

export function toExportRow(record: PlaceRecord): ExportRow {
  return {
    name: record.name,
    address: record.address ?? null,
    website: record.website ?? null,
    phone_number: record.phoneNumber ?? null,
    reviews_count: record.reviewsCount ?? null,
    reviews_average: record.reviewsAverage ?? null,
    latitude: record.latitude ?? null,
    longitude: record.longitude ?? null,
  };
}

/** Writes every batch as `<name>.xlsx` and `<name>.csv` under the output directory. */
export class ExportService implements RecordSink {
  constructor(private readonly outputDir: string) {}

  async write(name: string, records: RecordBatch): Promise<string[]> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const rows = records.map(toExportRow);
    const excelFile = await this.saveToExcel(name, rows);
    const csvFile = await this.saveToCsv(name, rows);
    return [excelFile, csvFile];
  }

  private async saveToExcel(name: string, rows: ExportRow[]): Promise<string> {
    const filePath = path.join(this.outputDir, `${name}.xlsx`);
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet(WORKSHEET_NAME);
    sheet.columns = EXPORT_COLUMNS.map((column) => ({ header: column, key: column }));
    sheet.addRows(rows);
    await workbook.xlsx.writeFile(filePath);
    return filePath;
  }

  private async saveToCsv(name: string, rows: ExportRow[]): Promise<string> {
    const filePath = path.join(this.outputDir, `${name}.csv`);
    const writer = createObjectCsvWriter({
      path: filePath,
      header: EXPORT_COLUMNS.map((column) => ({ id: column, title: column })),
    });
    await writer.writeRecords(rows);
    return filePath;
  }
}
