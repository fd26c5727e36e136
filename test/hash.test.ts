import { describe, expect, it } from 'vitest';
import { canonicalJson, contentHash } from '../src/sync/hash.js';

describe('contentHash', () => {
  it('writes the hashed fields in sorted order with nulls for absent values', () => {
    expect(canonicalJson({ title: 'Buy milk', status: 'active', priority: 2 })).toBe(
      '{"dueDate":null,"parentId":null,"priority":2,"projectId":null,"sectionId":null,"status":"active","title":"Buy milk"}',
    );
  });

  it('ignores fields outside the hashed set', () => {
    const base = { title: 'Buy milk', status: 'active' as const, priority: 2 as const };
    const withExtras = { ...base, description: 'semi-skimmed', projectName: 'Home' };
    expect(contentHash(withExtras)).toBe(contentHash(base));
  });

  it('changes when a hashed field changes', () => {
    const base = { title: 'Buy milk', status: 'active' as const, priority: 2 as const };
    expect(contentHash({ ...base, status: 'completed' })).not.toBe(contentHash(base));
    expect(contentHash({ ...base, dueDate: '2026-03-02' })).not.toBe(contentHash(base));
    expect(contentHash(base)).toMatch(/^[0-9a-f]{64}$/);
  });
});
