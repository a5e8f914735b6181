import { describe, it, expect } from 'vitest';
import { mapToolNames, toCatalogName } from '../tool-name-policy.js';

describe('mapToolNames', () => {
  it('rewrites namespaced names and keeps provider names unique', () => {
    const mapping = mapToolNames(['a.memory_set', 'a_memory_set', 'memory_get']);
    expect([...mapping.providerByCatalog]).toEqual([
      ['a.memory_set', 'a_memory_set'],
      ['a_memory_set', 'a_memory_set_2'],
      ['memory_get', 'memory_get'],
    ]);
    expect(toCatalogName(mapping, 'a_memory_set')).toBe('a.memory_set');
    expect(toCatalogName(mapping, 'a_memory_set_2')).toBe('a_memory_set');
    expect(toCatalogName(mapping, 'not_mapped')).toBe('not_mapped');
  });

  it('truncates long names and never produces an empty one', () => {
    const mapping = mapToolNames(['x'.repeat(70), '...']);
    expect(mapping.providerByCatalog.get('x'.repeat(70))).toBe('x'.repeat(64));
    expect(mapping.providerByCatalog.get('...')).toBe('tool');
  });

  it('leaves names providers already accept unchanged', () => {
    const mapping = mapToolNames(['file-read_2', 'memory_get']);
    expect([...mapping.catalogByProvider.keys()]).toEqual(['file-read_2', 'memory_get']);
  });
});
