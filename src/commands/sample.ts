import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { Logger } from '../utils/logger.js';

const logger = new Logger('Sample');

export const SAMPLE_TOPICS = [
  {
    id: 'garden-001',
    topic: 'Benefits of Organic Gardening',
    word_count: 1800,
    outline: 'What organic gardening means | Soil health | Pest control without chemicals | Getting started',
    category: 'Gardening',
    tags: 'organic, sustainability',
    keywords: 'organic gardening, natural farming',
    video_required: 'true'
  },
  {
    id: 'seo-001',
    topic: 'A Quick Guide to Technical SEO',
    word_count: 1500,
    outline: '',
    category: 'Digital Marketing',
    tags: 'seo, websites',
    keywords: 'technical seo, site speed',
    video_required: 'false'
  }
];

export async function sampleCommand(directory = '.'): Promise<string> {
  const filePath = path.resolve(directory, 'topics.csv');
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, stringify(SAMPLE_TOPICS, { header: true }), 'utf8');
  logger.info(`Created sample topics file: ${filePath}`);
  return filePath;
}
