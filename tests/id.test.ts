import { describe, expect, it } from 'vitest';

import { newRunId, parseRunId } from '../src/utils/id.js';

describe('run id', () => {
  it('formats sortable ids from the UTC time', () => {
    const id = newRunId(new Date('2026-02-07T09:05:03Z'), 'a1b2');
    expect(id).toBe('r-20260207-090503-a1b2');
    expect(parseRunId(id)).toEqual({ yyyyMMdd: '20260207', hhmmss: '090503', suffix: 'a1b2' });
  });

  it('uses a random hex suffix by default', () => {
    expect(parseRunId(newRunId())).not.toBeNull();
    expect(parseRunId('j-20260207-001')).toBeNull();
  });
});
