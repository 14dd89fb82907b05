/**
 * Scheduler for Roster Refresh
 *
 * Reloads the technician roster on a fixed interval in-process.
 * Uses setInterval to avoid external cron dependencies; a slow load is never
 * started twice and never blocks assignment requests.
 */

import type { RosterStore } from '../lib/roster/rosterStore';

let refreshInterval: NodeJS.Timeout | null = null;
let isRunning = false; // Prevent concurrent runs

/**
 * Runs one roster refresh
 */
export async function runRosterRefresh(store: RosterStore): Promise<void> {
  if (isRunning) {
    console.log('⏭️  Roster refresh already running, skipping...');
    return;
  }

  isRunning = true;

  try {
    console.log('\n🔔 Scheduled roster refresh triggered');
    await store.refresh();
  } catch (error) {
    // The store already logged it and kept the stale snapshot
    const message = error instanceof Error ? error.message : String(error);
    console.error('❌ Error in scheduled roster refresh:', message);
  } finally {
    isRunning = false;
  }
}

/**
 * Starts the refresh cycle
 */
export function startRosterRefresh(store: RosterStore, options: { enabled: boolean; minutes: number }): boolean {
  if (!options.enabled) {
    console.log('⏭️  Roster refresh disabled (ROSTER_REFRESH_ENABLED=false)');
    return false;
  }

  if (store.status().source === 'none') {
    console.log('⏭️  Roster refresh disabled (no roster source configured)');
    return false;
  }

  if (options.minutes <= 0) {
    console.log('⏭️  Roster refresh disabled (ROSTER_REFRESH_MINUTES must be positive)');
    return false;
  }

  stopRosterRefresh();

  refreshInterval = setInterval(() => {
    void runRosterRefresh(store);
  }, options.minutes * 60 * 1000);

  console.log(`   ✅ Roster refresh started (every ${options.minutes} minutes)`);
  return true;
}

/**
 * Stops the refresh cycle
 */
export function stopRosterRefresh(): void {
  if (refreshInterval) {
    clearInterval(refreshInterval);
    refreshInterval = null;
    console.log('⏹️  Roster refresh stopped');
  }
}
