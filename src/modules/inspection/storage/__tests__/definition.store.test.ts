import { describe, it, expect } from 'vitest';
import { labelHighRisk } from '../../labeling/risk.labeler.js';
import { DuplicateRunError, InMemoryDefinitionStore } from '../definition.store.js';
import { uniformRecords } from '../../__tests__/test.fixtures.js';

describe('InMemoryDefinitionStore', () => {
  const { definition } = labelHighRisk(uniformRecords(20), { quantile: 0.25 });

  it('stores and returns a definition by run id', async () => {
    const store = new InMemoryDefinitionStore();
    const saved = await store.save('run-a', definition, Date.UTC(2026, 0, 2, 3, 4, 5));
    expect(saved.createdAt).toBe('2026-01-02T03:04:05.000Z');
    expect(await store.get('run-a')).toEqual(saved);
    expect(store.size).toBe(1);
  });

  it('returns null for an unknown run', async () => {
    expect(await new InMemoryDefinitionStore().get('missing')).toBeNull();
  });

  it('refuses to overwrite a stored definition', async () => {
    const store = new InMemoryDefinitionStore();
    await store.save('run-a', definition, 0);
    await expect(store.save('run-a', definition, 1)).rejects.toBeInstanceOf(DuplicateRunError);
  });
});
