/**
 * Provision the fixed set of accounts this deployment starts with.
 * Existing accounts are left untouched, so re-running is safe.
 */

import 'dotenv/config';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { userIdSchema } from '@tokenboard/shared';
import { loadConfig } from '../src/lib/config.js';
import { openDatabase } from '../src/lib/db.js';
import { logger } from '../src/lib/logger.js';
import { LedgerService } from '../src/ledger/ledgerService.js';

const seedFileSchema = z.array(
  z.object({
    userId: userIdSchema,
    name: z.string().min(1),
    product: z.string().nullable().optional(),
  })
);

async function main() {
  const config = loadConfig();
  const seedPath = fileURLToPath(new URL('../seed/accounts.json', import.meta.url));
  const seeds = seedFileSchema.parse(JSON.parse(fs.readFileSync(seedPath, 'utf-8')));

  const ledger = new LedgerService({
    db: openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs }),
    timeZone: config.timeZone,
  });

  logger.info({ databasePath: config.databasePath, count: seeds.length }, 'Seeding accounts...');

  try {
    for (const seed of seeds) {
      const created = await ledger.provision(seed);
      if (created) {
        logger.info(`  Created account ${seed.userId} (${seed.name})`);
      } else {
        logger.info(`  Account ${seed.userId} already exists, skipping`);
      }
    }
  } finally {
    ledger.close();
  }

  logger.info('Done');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Seeding failed');
  process.exit(1);
});
