/**
 * API Server for Cleaning Dispatch
 *
 * Assigns cleaning jobs to technicians over HTTP. The technician roster is
 * loaded before the server accepts requests and refreshed in the background.
 */

// Load environment variables before anything reads them
import { config } from '../lib/config';

import { createServices } from '../lib/services';
import { createApp } from './app';
import { startRosterRefresh } from '../jobs/scheduler';

// Start server
async function startServer(): Promise<void> {
  console.log('🚀 Starting Cleaning Dispatch API Server\n');

  const deps = createServices(config);

  // Initial roster load BEFORE accepting requests
  console.log(`   Roster source: ${config.rosterSource}`);
  await deps.rosterStore.init();

  const app = createApp(deps);

  app.listen(config.apiPort, () => {
    console.log(`\n✅ API Server running on http://localhost:${config.apiPort}`);
    console.log(`   Health check: http://localhost:${config.apiPort}/api/health`);
    console.log(`   Assign API: http://localhost:${config.apiPort}/api/assign`);
    console.log(`   Roster API: http://localhost:${config.apiPort}/api/roster/*`);

    startRosterRefresh(deps.rosterStore, {
      enabled: config.rosterRefreshEnabled,
      minutes: config.rosterRefreshMinutes,
    });
  });
}

startServer().catch(err => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
