import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { SignalSets } from '../types/job';

export const DEFAULT_SIGNALS_FILE = 'config/signals.json';

const keywordList = z.array(z.string().min(1));

export const signalSetsSchema = z.object({
  juniorSignals: keywordList,
  middleSignals: keywordList,
  seniorSignals: keywordList,
  itRoles: keywordList.min(1),
  remoteKeywords: keywordList.default([]),
  techStack: keywordList.default([]),
});

/**
 * Loads keyword signal sets from a JSON file (relative paths resolve from cwd)
 */
export function loadSignalSets(filePath: string = DEFAULT_SIGNALS_FILE): SignalSets {
  const absolutePath = resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Cannot read signal sets from ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = signalSetsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid signal sets in ${absolutePath}: ${issue.path.join('.')} ${issue.message}`);
  }

  return result.data;
}
