/**
 * Resolve an insider name from the command line and print the result as JSON.
 *
 * Usage:
 *   npx tsx scripts/resolve-insider.ts "Gale Klappa"
 *   npx tsx scripts/resolve-insider.ts "Gale Klappa" --entity-limit 500 --no-fallback
 *   npx tsx scripts/resolve-insider.ts "Gale Klappa" --current
 *
 * Environment:
 *   EDGAR_USER_AGENT should name you and a contact address
 */

import { getRedisClient } from '@/lib/redis/client';
import { createInsiderResolver, InvalidQueryError, type ResolveOptions } from '@/lib/insider';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

const name = args.find((arg, idx) => !arg.startsWith('--') && args[idx - 1] !== '--entity-limit');
const entityLimitArg = getArg('entity-limit');
const currentOnly = args.includes('--current');
const forceRefresh = args.includes('--refresh');

if (!name) {
  console.error('Usage: resolve-insider.ts "<name>" [--entity-limit N] [--no-fallback] [--current] [--refresh]');
  process.exit(1);
}

const options: ResolveOptions = {
  fallbackOnEmpty: !args.includes('--no-fallback'),
  forceRefresh,
};

if (entityLimitArg !== undefined) {
  const entityLimit = parseInt(entityLimitArg, 10);
  if (!Number.isFinite(entityLimit) || entityLimit <= 0) {
    console.error(`Error: --entity-limit must be a positive integer, got "${entityLimitArg}"`);
    process.exit(1);
  }
  options.entityLimit = entityLimit;
}

const redis = getRedisClient();

async function main(query: string) {
  const resolver = createInsiderResolver({ redis });

  if (currentOnly) {
    const positions = await resolver.getCurrentPositions(query, options);
    console.log(JSON.stringify(positions, null, 2));
    return;
  }

  const identity = await resolver.resolveIdentity(query, options);
  console.log(JSON.stringify(identity, null, 2));
  if (identity.status === 'not_found') {
    process.exitCode = 2;
  }
}

main(name)
  .catch((err) => {
    if (err instanceof InvalidQueryError) {
      console.error(err.message);
    } else {
      console.error('Resolution failed:', err);
    }
    process.exitCode = 1;
  })
  .finally(async () => {
    await redis?.quit();
  });
