import ExcelJS from 'exceljs';
import { TopicSource, normalizeHeader, type TopicRow } from './base.js';
import { TopicSourceError } from '../errors.js';
import { Logger } from '../utils/logger.js';

export class ExcelTopicSource extends TopicSource {
  protected logger = new Logger('Topics:xlsx');

  getSourceName(): string {
    return 'xlsx';
  }

  protected async *readRows(): AsyncGenerator<TopicRow> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.filePath);

    const worksheet = workbook.worksheets[0];
    if (!worksheet) {
      throw new TopicSourceError(`No worksheets found in ${this.filePath}`);
    }

    const headers: string[] = [];
    worksheet.getRow(1).eachCell({ includeEmpty: true }, (cell, colNumber) => {
      headers[colNumber - 1] = normalizeHeader(cell.text || '');
    });
    this.checkHeader(headers);

    for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
      const row = worksheet.getRow(rowNumber);
      if (!row.hasValues) {
        continue;
      }

      const values: TopicRow = {};
      headers.forEach((header, index) => {
        if (header) {
          values[header] = row.getCell(index + 1).text.trim();
        }
      });
      yield values;
    }
  }
}
