/**
 * Print the partitions of a table and what the configured policy would drop.
 * Read-only: issues no DDL.
 *
 * Usage: tsx scripts/list-partitions.ts [table] [schema]
 * Defaults come from RETENTION_TARGET_TABLE / RETENTION_TARGET_SCHEMA.
 */

import { config } from '../src/config';
import { db } from '../src/database/client';
import { createRetentionPolicy } from '../src/models/retention-policy';
import { PartitionCatalog } from '../src/repositories/partition-catalog.repository';
import { decideRetention } from '../src/services/retention-decider';

async function listPartitions() {
  const policy = createRetentionPolicy({
    ...config.retention,
    targetTable: process.argv[2] ?? config.retention.targetTable,
    targetSchema: process.argv[3] ?? config.retention.targetSchema,
  });
  const catalog = new PartitionCatalog(db, {
    partitionIntervalSeconds: config.retention.partitionIntervalSeconds,
  });

  try {
    const table = `${policy.targetSchema}.${policy.targetTable}`;
    if (!(await catalog.tableExists(policy.targetSchema, policy.targetTable))) {
      console.log(`Table ${table} does not exist`);
      return;
    }

    const partitions = await catalog.listPartitions(policy.targetSchema, policy.targetTable);
    const now = await catalog.serverTime();
    const plan = decideRetention(partitions, policy, now);
    const toDrop = new Set(plan.partitionsToDrop.map((partition) => partition.physicalName));

    console.log(`=== ${table} (${partitions.length} partitions) ===`);
    console.log(`Server time: ${now.toISOString()}`);
    console.log(`Cutoff:      ${plan.cutoff.toISOString()} (${policy.retentionSeconds}s retention, ${policy.mode})\n`);

    for (const partition of partitions) {
      const marker = toDrop.has(partition.physicalName) ? 'DROP' : 'keep';
      console.log(
        `  [${marker}] ${partition.physicalName}  ${partition.windowStart.toISOString()} -> ${partition.windowEnd.toISOString()}`
      );
    }

    console.log(`\n${toDrop.size} partition(s) would be dropped`);
    if (plan.dropParent) {
      console.log(`Parent ${table} would be dropped afterwards`);
    }
  } finally {
    await db.close();
  }
}

listPartitions().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
