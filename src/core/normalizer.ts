/**
 * CIF Normalizer
 *
 * Turns raw task records into CIF tasks through an effective mapping.
 * Unclassified concepts are kept in `unmapped`; nothing is guessed.
 */

import { EXPLICIT_NONE, UNMAPPED, type CIFTask, type RawTaskRecord } from './types.js';
import type { EffectiveMapping } from './resolver.js';

export function normalize(record: RawTaskRecord, mapping: EffectiveMapping): CIFTask {
  const task: CIFTask = {
    sourceTool: record.tool,
    sourceId: record.sourceId,
    title: record.title,
    fields: {},
    unmapped: [],
  };

  for (const conceptId of record.conceptIds) {
    const resolution = mapping.resolve(record.tool, conceptId);

    if (resolution === EXPLICIT_NONE) {
      continue;
    }

    if (resolution === UNMAPPED) {
      pushUnique(task.unmapped, conceptId);
      continue;
    }

    const entity = mapping.lookup(resolution.entityId);
    if (!entity) {
      // mapped to an entity the registry does not know
      pushUnique(task.unmapped, conceptId);
      continue;
    }

    const values = task.fields[entity.role] ?? [];
    pushUnique(values, entity.id);
    task.fields[entity.role] = values;
  }

  return task;
}

export function normalizeAll(records: RawTaskRecord[], mapping: EffectiveMapping): CIFTask[] {
  return records.map((r) => normalize(r, mapping));
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}
