#!/usr/bin/env npx tsx

/**
 * Fetch equipment and energy data for a SolarEdge site and dump to console
 *
 * Usage:
 *   npm run fetch-energy                      # Last week
 *   npm run fetch-energy -- --unit day        # Today
 *   npm run fetch-energy -- --equipment       # Also list equipment
 *
 * Reads SOLAREDGE_USERNAME, SOLAREDGE_PASSWORD, SOLAREDGE_SITE_ID and
 * SOLAREDGE_TIMEOUT from the environment or a .env file.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { loadPortalConfig } from '../logic/config';
import { PortalClient, PortalHttpClient } from '../logic/portalApi';
import { parseTimeUnit, sortByStartTime, totalEnergy } from '../logic/utils/energyUtils';
import { extractErrorMessage } from '../logic/utils/errorUtils';

type CliOptions = {
  unit: string;
  equipment: boolean;
  verbose: boolean;
};

async function main(): Promise<void> {
  const program = new Command();
  program
    .name('fetch-energy')
    .description('Fetch 15-minute energy data from the SolarEdge monitoring portal')
    .option('--unit <unit>', 'Time window: day or week', 'week')
    .option('--equipment', 'List the site equipment', false)
    .option('--verbose', 'Log portal requests', false)
    .parse();

  const options = program.opts<CliOptions>();
  const timeUnit = parseTimeUnit(options.unit);
  const config = loadPortalConfig();

  const client = new PortalClient(config.credentials, config.siteId, new PortalHttpClient(), {
    timeout: config.timeout,
    logger: options.verbose ? console : { log: () => undefined, error: console.error },
  });

  console.log('='.repeat(60));
  console.log(`SolarEdge site ${config.siteId}`);
  console.log('='.repeat(60));

  if (options.equipment) {
    const equipment = await client.getEquipment();
    console.log();
    console.log(`Equipment (${equipment.size}):`);
    for (const [id, data] of equipment) {
      const name = typeof data.name === 'string' ? data.name : '';
      const type = typeof data.type === 'string' ? data.type : '';
      console.log(`  ${id}  ${type}  ${name}`);
    }
  }

  const energyData = sortByStartTime(await client.getEnergyData(timeUnit));
  console.log();
  console.log(`Energy samples (${energyData.length}):`);
  for (const sample of energyData) {
    console.log(
      `  ${sample.startTime.toISOString()}  ${totalEnergy(sample).toFixed(1)} Wh  (${sample.values.size} reporters)`,
    );
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${extractErrorMessage(error)}`);
  process.exit(1);
});
