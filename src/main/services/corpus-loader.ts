/**
 * Corpus loader: reads the normalized violations JSON written by the ETL
 * pipeline and validates it before graph construction.
 */

import * as fsp from 'fs/promises';
import { createLogger } from './logger';
import { CorpusLoadError } from '../../shared/types/errors';
import { ViolationCorpusSchema, toViolationRecord } from '../../shared/schemas/violation-schema';
import type { ViolationRecord } from '../../shared/types/knowledge-graph';

const log = createLogger('CorpusLoader');

/** Validate already-parsed corpus data. */
export function parseCorpus(data: unknown, source = 'corpus'): ViolationRecord[] {
  const result = ViolationCorpusSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new CorpusLoadError(`Invalid corpus in ${source}: ${issues.join('; ')}`, {
      source,
      issueCount: result.error.issues.length,
    });
  }
  return result.data.violations.map(toViolationRecord);
}

export async function loadCorpus(filePath: string): Promise<ViolationRecord[]> {
  let text: string;
  try {
    text = await fsp.readFile(filePath, 'utf8');
  } catch (err) {
    throw new CorpusLoadError(`Cannot read corpus file ${filePath}`, { filePath }, err instanceof Error ? err : undefined);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new CorpusLoadError(`Corpus file ${filePath} is not valid JSON`, { filePath }, err instanceof Error ? err : undefined);
  }

  const records = parseCorpus(data, filePath);
  log.info(`Loaded ${records.length} violations from ${filePath}`);
  return records;
}
