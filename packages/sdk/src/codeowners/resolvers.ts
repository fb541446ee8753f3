/**
 * TeamResolver implementations that need no hosting provider.
 *
 * @module codeowners/resolvers
 */

import type { TeamResolver } from './types.js';

export class InMemoryTeamResolver implements TeamResolver {
  private readonly teams: Map<string, string[]>;

  constructor(teams: Record<string, string[]> = {}) {
    this.teams = new Map(Object.entries(teams));
  }

  setTeam(slug: string, members: string[]): void {
    this.teams.set(slug, [...members]);
  }

  async resolve(teamSlug: string): Promise<string[] | null> {
    const members = this.teams.get(teamSlug);
    return members ? [...members] : null;
  }
}

/**
 * Wrap a resolver so each slug is looked up at most once. Meant for one
 * run of the CLI; the rule engine itself never caches.
 */
export function memoizeTeamResolver(resolver: TeamResolver): TeamResolver {
  const pending = new Map<string, Promise<string[] | null>>();

  return {
    resolve(teamSlug: string): Promise<string[] | null> {
      let result = pending.get(teamSlug);
      if (!result) {
        result = resolver.resolve(teamSlug);
        pending.set(teamSlug, result);
        // failed lookups are retried on the next call
        void result.catch(() => pending.delete(teamSlug));
      }
      return result;
    },
  };
}
