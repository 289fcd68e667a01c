/**
 * FeedSync — Sync All Script
 *
 * Syncs every tracked feed once and prints a per-feed summary.
 * Meant for an external cron job or workflow scheduler.
 *
 * Usage:
 *   npm run sync
 *
 * Cron Setup (every 30 minutes):
 *   0,30 * * * * cd /path/to/feedsync && npm run sync >> /var/log/feedsync.log 2>&1
 *
 * Exits 1 if any feed failed or storage was unavailable.
 */

import 'dotenv/config';
import { createSyncEngine } from '../src';
import { logger } from '../src/lib/logger';

async function syncAllFeeds(): Promise<void> {
  try {
    const engine = createSyncEngine();
    const result = await engine.syncAll();

    for (const feed of result.results) {
      if (feed.status === 'success') {
        console.log(`  ✓ ${feed.url}: ${feed.newEntries} new`);
      } else {
        console.log(`  ✗ ${feed.url}: ${feed.error}`);
      }
    }

    console.log(
      `\n${result.succeeded}/${result.results.length} feeds synced, ` +
        `${result.totalNewEntries} new entries (${(result.durationMs / 1000).toFixed(2)}s)`
    );

    if (result.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    logger.error('Sync run failed', { error: errorMsg });
    process.exit(1);
  }
}

void syncAllFeeds();
