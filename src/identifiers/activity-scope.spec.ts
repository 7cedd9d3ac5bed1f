import { ActivityScope, parseActivityScope } from './activity-scope';

describe('parseActivityScope', () => {
  it('recognizes the session and pageview scopes', () => {
    expect(parseActivityScope('session')).toBe(ActivityScope.Session);
    expect(parseActivityScope('pageview')).toBe(ActivityScope.Pageview);
  });

  it('returns null for anything else', () => {
    expect(parseActivityScope('')).toBeNull();
    expect(parseActivityScope('PAGEVIEW')).toBeNull();
    expect(parseActivityScope('page')).toBeNull();
  });
});
