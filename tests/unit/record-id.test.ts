import { compactTimestamp, generateRecordId, safeKey } from '../../src/lib/record-id';

describe('record ids', () => {
  it('should make epic keys safe for file names', () => {
    expect(safeKey('PROJ-100')).toBe('PROJ-100');
    expect(safeKey('team/epic #4')).toBe('team-epic-4');
  });

  it('should format UTC timestamps compactly', () => {
    expect(compactTimestamp(new Date('2026-01-05T03:04:09Z'))).toBe('20260105_030409');
  });

  it('should generate distinct ids for the same epic and second', () => {
    const now = new Date('2026-01-05T03:04:09Z');
    const first = generateRecordId('PROJ-100', now);
    const second = generateRecordId('PROJ-100', now);

    expect(first).toMatch(/^PROJ-100_20260105_030409_[0-9a-f]{8}$/);
    expect(second).not.toBe(first);
  });
});
