/**
 * Roster Check Script
 *
 * Loads the configured roster and runs every technician through the same
 * validation an assignment run uses, so sheet problems show up before dispatch.
 *
 * Usage: npm run check-roster
 */

import { config } from '../lib/config';
import { createServices } from '../lib/services';
import { resolveTechnicians } from '../lib/assignment/validation';

async function main() {
  console.log('🚀 Roster Check Script\n');
  console.log('='.repeat(60));

  if (config.rosterSource === 'none') {
    console.error('❌ No roster source configured!');
    console.error('   Set ROSTER_CSV_URL, ROSTER_CSV_PATH or SUPABASE_URL + SUPABASE_SERVICE_ROLE_KEY first.');
    process.exit(1);
  }

  const deps = createServices(config);

  console.log(`📂 Loading roster from ${config.rosterSource}...`);
  await deps.rosterStore.refresh();
  const roster = deps.rosterStore.currentRoster();
  console.log(`   Found ${roster.length} technicians\n`);

  const { technicians, skipped } = await resolveTechnicians(roster, deps.geocoder);

  for (const technician of technicians) {
    console.log(
      `   ✓ ${technician.technicianId.padEnd(10)} ${(technician.name ?? '-').padEnd(12)} ` +
      `${technician.serviceTypes.join(', ')} (${technician.home.lat.toFixed(5)}, ${technician.home.lng.toFixed(5)})`
    );
  }
  for (const entry of skipped) {
    console.log(`   ✗ ${entry.technicianId.padEnd(10)} ${entry.reason}: ${entry.detail}`);
  }

  console.log('\n' + '='.repeat(60));
  console.log(`✅ Usable: ${technicians.length}`);
  console.log(`⚠️  Skipped: ${skipped.length}`);
}

main().catch(error => {
  console.error('❌ Roster check failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
