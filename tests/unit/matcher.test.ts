import { Matcher, bestTitleMatch, normalizeTitle, titleSimilarity } from '../../src/lib/matcher';
import { makeRemote, makeStory } from '../helpers/fixtures';

describe('normalizeTitle', () => {
  it('should lowercase, strip punctuation and collapse whitespace', () => {
    expect(normalizeTitle('Login:  with E-mail!')).toBe('login with e mail');
  });

  it('should keep non-latin letters and digits', () => {
    expect(normalizeTitle('Größe 42 ändern')).toBe('größe 42 ändern');
  });
});

describe('titleSimilarity', () => {
  it('should score equal titles 1 after normalization', () => {
    expect(titleSimilarity('Login with email', 'login with EMAIL!')).toBe(1);
    expect(titleSimilarity('', '  ')).toBe(1);
  });

  it('should score by shared characters', () => {
    expect(titleSimilarity('abc', 'abd')).toBeCloseTo(4 / 6);
    expect(titleSimilarity('', 'x')).toBe(0);
  });
});

describe('bestTitleMatch', () => {
  const candidate = (title: string, order: number, createdAt: string) => ({ item: title, title, order, createdAt });

  it('should prefer the earliest created candidate on a tie', () => {
    const result = bestTitleMatch(
      'Export report',
      [candidate('Export report', 0, '2026-02-01T00:00:00Z'), candidate('Export report', 1, '2026-01-01T00:00:00Z')],
      0.8
    );

    expect(result.match?.order).toBe(1);
    expect(result.score).toBe(1);
  });

  it('should fall back to input order when creation times tie', () => {
    const same = '2026-01-01T00:00:00Z';
    const result = bestTitleMatch('Export report', [candidate('Export report', 0, same), candidate('Export report', 1, same)], 0.8);

    expect(result.match?.order).toBe(0);
  });

  it('should report the best score even below the threshold', () => {
    const result = bestTitleMatch('abc', [candidate('abd', 0, '2026-01-01T00:00:00Z')], 0.8);

    expect(result.match).toBeNull();
    expect(result.score).toBeCloseTo(4 / 6);
  });

  it('should report a null score without candidates', () => {
    expect(bestTitleMatch('abc', [], 0.8)).toEqual({ match: null, score: null });
  });
});

describe('Matcher', () => {
  it('should match by recorded key before title', () => {
    const stories = [
      makeStory({ id: 'US-001', title: 'Renamed story', remoteKey: 'PROJ-2' }),
      makeStory({ id: 'US-002', title: 'Login with email' }),
    ];
    const remotes = [
      makeRemote({ key: 'PROJ-1', summary: 'Login with email' }),
      makeRemote({ key: 'PROJ-2', summary: 'Login with email' }),
    ];

    const results = new Matcher().matchAll(stories, remotes);

    expect(results.get('US-001')).toEqual({ kind: 'exact_key', key: 'PROJ-2' });
    expect(results.get('US-002')).toEqual({ kind: 'fuzzy_title', key: 'PROJ-1', score: 1 });
  });

  it('should assign each remote issue to one story at most', () => {
    const stories = [makeStory({ id: 'US-001' }), makeStory({ id: 'US-002' })];
    const remotes = [makeRemote({ key: 'PROJ-1' })];

    const results = new Matcher().matchAll(stories, remotes);

    expect(results.get('US-001')).toEqual({ kind: 'fuzzy_title', key: 'PROJ-1', score: 1 });
    expect(results.get('US-002')).toEqual({ kind: 'no_match', bestScore: null });
  });

  it('should fall back to title matching when the recorded key was not fetched', () => {
    const stories = [makeStory({ remoteKey: 'PROJ-99' })];
    const remotes = [makeRemote({ key: 'PROJ-1' })];

    expect(new Matcher().matchAll(stories, remotes).get('US-001')).toEqual({
      kind: 'fuzzy_title',
      key: 'PROJ-1',
      score: 1,
    });
  });

  it('should not match below the threshold', () => {
    const stories = [makeStory({ title: 'abc' })];
    const remotes = [makeRemote({ summary: 'abd' })];

    const result = new Matcher(0.8).matchAll(stories, remotes).get('US-001');

    expect(result?.kind).toBe('no_match');
    expect(new Matcher(0.5).matchAll(stories, remotes).get('US-001')?.kind).toBe('fuzzy_title');
  });
});
