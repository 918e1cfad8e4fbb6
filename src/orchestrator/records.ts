/**
 * Routes a parsed classification into its structured table.
 */

import type { Classification, RecordKind } from '../services/anthropic/index.js';
import type { RecordStore } from '../services/store/index.js';

export async function routeClassification(
  store: RecordStore,
  classification: Classification
): Promise<{ kind: RecordKind; id: number }> {
  switch (classification.kind) {
    case 'task':
      return {
        kind: 'task',
        id: await store.addTask({ description: classification.description, dueDate: classification.dueDate }),
      };
    case 'habit':
      return {
        kind: 'habit',
        id: await store.addHabit({ name: classification.name, frequency: classification.frequency }),
      };
    case 'note':
      return { kind: 'note', id: await store.addNote({ note: classification.content }) };
  }
}
