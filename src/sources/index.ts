import path from 'path';
import { TopicSourceError } from '../errors.js';
import type { TopicSource, TopicSourceOptions } from './base.js';
import { CsvTopicSource } from './csv.js';
import { ExcelTopicSource } from './excel.js';

export function openTopicSource(filePath: string, options: TopicSourceOptions = {}): TopicSource {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.csv':
      return new CsvTopicSource(filePath, options);
    case '.xlsx':
      return new ExcelTopicSource(filePath, options);
    default:
      throw new TopicSourceError(`Unsupported input format '${extension || filePath}'. Use .csv or .xlsx`);
  }
}

export { TopicSource, parseOutline, parseTopicRow } from './base.js';
