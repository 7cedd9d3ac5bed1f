/** Lifetime bucket an activity sequence number is keyed to. */
export enum ActivityScope {
  Session = 'session',
  Pageview = 'pageview',
}

export function parseActivityScope(name: string): ActivityScope | null {
  switch (name) {
    case ActivityScope.Session:
      return ActivityScope.Session;
    case ActivityScope.Pageview:
      return ActivityScope.Pageview;
    default:
      return null;
  }
}
