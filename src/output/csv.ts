import path from 'node:path';
import { createObjectCsvWriter } from 'csv-writer';
import { ensureDir } from '../util/fileCache';
import type { ProspectRecord } from '../types';

export const CSV_HEADER = [
  { id: 'name', title: 'Company' },
  { id: 'segment', title: 'Segment' },
  { id: 'region', title: 'Country/Region' },
  { id: 'justification', title: 'WhyRelevant' },
  { id: 'website', title: 'Website' },
  { id: 'priority', title: 'Priority' }
];

export async function writeProspectsCsv(file: string, prospects: readonly ProspectRecord[]): Promise<void> {
  ensureDir(path.dirname(path.resolve(file)));
  const writer = createObjectCsvWriter({ path: file, header: CSV_HEADER });
  await writer.writeRecords(prospects.map(p => ({ ...p })));
}
