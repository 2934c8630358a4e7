import { describe, expect, it } from 'vitest';
import { buildWhereClause } from './lance-store.js';

describe('buildWhereClause', () => {
  it('returns no predicate without a filter', () => {
    expect(buildWhereClause(undefined)).toEqual({ residual: false });
  });

  it('pushes column filters down as SQL with escaped literals', () => {
    expect(buildWhereClause({ documentId: "o'brien", position: 2 })).toEqual({
      where: "`documentId` = 'o''brien' AND `position` = 2",
      residual: false,
    });
  });

  it('leaves metadata keys for post-filtering', () => {
    expect(buildWhereClause({ sourceName: null, topic: 'search' })).toEqual({
      where: '`sourceName` IS NULL',
      residual: true,
    });
    expect(buildWhereClause({ topic: 'search' })).toEqual({ where: undefined, residual: true });
  });
});
