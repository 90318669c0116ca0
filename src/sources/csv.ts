import { createReadStream } from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { TopicSource, normalizeHeader, type TopicRow } from './base.js';
import { TopicSourceError } from '../errors.js';
import { Logger } from '../utils/logger.js';

const CellsSchema = z.array(z.string());

export class CsvTopicSource extends TopicSource {
  protected logger = new Logger('Topics:csv');

  getSourceName(): string {
    return 'csv';
  }

  protected async *readRows(): AsyncGenerator<TopicRow> {
    const parser = createReadStream(this.filePath).pipe(parse({
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true
    }));

    let headers: string[] | null = null;
    for await (const record of parser) {
      const cells = CellsSchema.parse(record);
      if (!headers) {
        headers = this.checkHeader(cells.map(normalizeHeader));
        continue;
      }

      // Short rows leave their trailing columns blank
      const row: TopicRow = {};
      headers.forEach((header, index) => {
        if (header) {
          row[header] = cells[index] ?? '';
        }
      });
      yield row;
    }

    if (!headers) {
      throw new TopicSourceError(`${this.filePath} has no header row`);
    }
  }
}
