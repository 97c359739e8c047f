/**
 * Cruise ID Resolution
 * 
 * An explicit ID wins. Otherwise the warehouse is asked; interactive
 * operators may override its answer or type one when it has none.
 */

export interface ResolveCruiseIdOptions {
  explicitId?: string;
  interactive: boolean;
  lookup: () => Promise<string | null>;
  ask: (question: string) => Promise<string>;
}

export async function resolveCruiseId(options: ResolveCruiseIdOptions): Promise<string | null> {
  const explicitId = options.explicitId?.trim();
  if (explicitId) {
    return explicitId;
  }

  const fetched = await options.lookup();

  if (!options.interactive) {
    return fetched;
  }

  if (fetched) {
    const answer = (await options.ask(`Enter a Cruise ID to use (or press enter for ${fetched}): `)).trim();
    return answer || fetched;
  }

  const answer = (await options.ask('Could not fetch cruise ID from API. Enter Cruise ID manually: ')).trim();
  return answer || null;
}
