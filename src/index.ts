/**
 * Command-line assignment run
 *
 * Usage: npm run assign -- <request.json> [output.json]
 *
 * The request file has the same shape as the POST /api/assign body. When it
 * has no technicians, the configured roster is loaded instead.
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from './lib/config';
import { createDistanceProvider, createGeocoder, defaultSystemRules } from './lib/services';
import { createRosterSource } from './lib/roster/sources';
import { RosterStore } from './lib/roster/rosterStore';
import { assign } from './lib/assignment/engine';
import { renderAssignmentTable, toAssignResponse } from './lib/assignment/output';
import { AssignRequestSchema, parseRequest, resolveSystemRules } from './lib/assignment/validation';

async function main() {
  const [inputArg, outputArg] = process.argv.slice(2);
  if (!inputArg) {
    console.error('Usage: npm run assign -- <request.json> [output.json]');
    process.exit(1);
  }

  console.log('🚀 Starting Cleaning Dispatch assignment run...\n');

  const inputPath = path.resolve(process.cwd(), inputArg);
  console.log(`📂 Reading request from ${inputPath}`);
  const body = parseRequest(AssignRequestSchema, JSON.parse(fs.readFileSync(inputPath, 'utf-8')));

  const distance = createDistanceProvider(config);
  const geocoder = createGeocoder(config);
  const rules = resolveSystemRules(body.system_rules, defaultSystemRules(config));

  let technicians: readonly unknown[] = body.technicians ?? [];
  if (!body.technicians) {
    console.log(`📂 Loading technicians from roster (${config.rosterSource})...`);
    const rosterStore = new RosterStore(createRosterSource(config));
    await rosterStore.init();
    technicians = rosterStore.currentRoster();
  }
  console.log(`   ${body.jobs.length} jobs, ${technicians.length} technicians\n`);

  if (technicians.length === 0) {
    console.error('❌ No technicians available. Add technicians to the request or configure a roster source.');
    process.exit(1);
  }

  console.log('🔍 Running assignment...\n');
  const result = await assign(
    { jobs: body.jobs, technicians, technicianStates: body.technician_states ?? [], rules },
    { distance, geocoder, sentinelMinutes: config.distanceSentinelMinutes }
  );
  const response = toAssignResponse(result);

  console.log('\n' + '='.repeat(100));
  console.log('ASSIGNMENT RESULTS');
  console.log('='.repeat(100));
  console.log(renderAssignmentTable(response));
  console.log('\n' + response.human_message);

  if (outputArg) {
    const outputPath = path.resolve(process.cwd(), outputArg);
    fs.writeFileSync(outputPath, JSON.stringify(response, null, 2), 'utf-8');
    console.log(`\n💾 Result written to: ${outputPath}`);
  }

  const stats = distance.getStats();
  console.log(`\n🚗 Travel lookups: ${stats.lookups} (${stats.cacheHits} cached, ${stats.failures} failed)`);
}

// Run the program
main().catch(error => {
  console.error('❌ Assignment run failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
