import type { CommandModule } from 'yargs';

import IdentifierProvider from '../../identifiers/identifier-provider';

/**
 * Resolves `name:scope` entries to activity identifiers. An unknown scope yields `null` for that
 * entry.
 */
export function generateIds(
  provider: IdentifierProvider,
  activities: string[],
): Record<string, string | null> {
  const ids: Record<string, string | null> = {
    session: provider.sessionId(),
    pageview: provider.pageviewId(),
  };
  for (const activity of activities) {
    const separator = activity.lastIndexOf(':');
    const name = separator === -1 ? activity : activity.slice(0, separator);
    const scope = separator === -1 ? '' : activity.slice(separator + 1);
    ids[`activity ${activity}`] = provider.activityId(name, scope);
  }
  return ids;
}

export const generateIdsCommand: CommandModule = {
  command: 'generate-ids',
  describe: 'Print a session id, a pageview id and activity ids',
  builder: (yargs) => {
    return yargs.options({
      activity: {
        type: 'string',
        array: true,
        description: 'Activity to generate an id for, as name:scope (scope is session or pageview)',
        alias: 'a',
        default: [],
      },
    });
  },
  handler: (argv) => {
    const { activity } = argv;
    const activities = Array.isArray(activity) ? activity.map(String) : [];
    const ids = generateIds(new IdentifierProvider(), activities);
    for (const [label, id] of Object.entries(ids)) {
      console.log(`${label}: ${id}`);
    }
  },
};
