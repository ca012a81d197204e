import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Workbook } from 'exceljs';
import { ExportService, WORKSHEET_NAME, toExportRow } from './export.service';
import { PlaceRecord } from '../types/scrape';

const HEADER = 'name,address,website,phone_number,reviews_count,reviews_average,latitude,longitude';

const beanThere: PlaceRecord = {
  name: 'Bean There',
  address: '12 Bean St, Springfield',
  website: 'beanthere.example.com',
  phoneNumber: '+1 555-0100',
  reviewsCount: 1234,
  reviewsAverage: 4.5,
  latitude: 12.34,
  longitude: -56.78,
};

const quietCorner: PlaceRecord = {
  name: 'Quiet Corner',
  address: '',
  website: '',
  phoneNumber: '',
};

describe('toExportRow', () => {
  it('flattens a record into snake_case columns', () => {
    expect(toExportRow(quietCorner)).toEqual({
      name: 'Quiet Corner',
      address: '',
      website: '',
      phone_number: '',
      reviews_count: null,
      reviews_average: null,
      latitude: null,
      longitude: null,
    });
  });
});

describe('ExportService', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'maps-export-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('writes a CSV and a spreadsheet per batch', async () => {
    const outputDir = path.join(tempDir, 'nested', 'output');
    const service = new ExportService(outputDir);

    const files = await service.write('google_maps_data_coffee_shops', [beanThere, quietCorner]);

    expect(files).toEqual([
      path.join(outputDir, 'google_maps_data_coffee_shops.xlsx'),
      path.join(outputDir, 'google_maps_data_coffee_shops.csv'),
    ]);

    const csvLines = fs.readFileSync(files[1], 'utf-8').split('\n');
    expect(csvLines).toEqual([
      HEADER,
      'Bean There,"12 Bean St, Springfield",beanthere.example.com,+1 555-0100,1234,4.5,12.34,-56.78',
      'Quiet Corner,,,,,,,',
      '',
    ]);

    const workbook = new Workbook();
    await workbook.xlsx.readFile(files[0]);
    const sheet = workbook.getWorksheet(WORKSHEET_NAME);
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(1).value).toBe('name');
    expect(sheet?.getRow(2).getCell(1).value).toBe('Bean There');
    expect(sheet?.getRow(2).getCell(5).value).toBe(1234);
    expect(sheet?.getRow(2).getCell(8).value).toBe(-56.78);
    expect(sheet?.getRow(3).getCell(1).value).toBe('Quiet Corner');
  });

  it('writes header-only files for an empty batch', async () => {
    const service = new ExportService(tempDir);

    const [xlsxFile, csvFile] = await service.write('google_maps_data_rare_town', []);

    expect(fs.readFileSync(csvFile, 'utf-8')).toBe(`${HEADER}\n`);

    const workbook = new Workbook();
    await workbook.xlsx.readFile(xlsxFile);
    expect(workbook.getWorksheet(WORKSHEET_NAME)?.rowCount).toBe(1);
  });
});
