/**
 * Basic Usage Example
 *
 * Builds both indexes over a few generated homes and runs filters through them.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  buildIndexes,
  createRandom,
  describeIndexes,
  generateProperties,
  logger,
  query,
  verifyIndexes,
} from "@homeindex/core";

function main(): void {
  logger.setEnabled(false);

  console.log("🏗️  Building indexes over 2000 generated homes...");
  const indexes = buildIndexes(generateProperties(2000, createRandom(7)));
  const summary = describeIndexes(indexes);
  console.log(`✅ ${summary.properties} properties, ${summary.hashSet.postingKeys} keys per index`);

  // Exact match on a discrete attribute
  console.log("\n🔍 Three bedrooms...");
  const exact = query({ where: { bedrooms: 3 } }, indexes.hashSet, indexes.postingList, { limit: 3 });
  console.log(`✅ ${exact.total} homes`);
  for (const home of exact.properties) {
    console.log(`   #${home.id}: $${home.price}, built ${home.yearBuilt}`);
  }

  // Ranges on bucketed attributes plus required features
  console.log("\n🔍 2-4 bedrooms, $200k-$400k, built since 1980, with a garage...");
  const ranged = query(
    {
      where: {
        bedrooms: { min: 2, max: 4 },
        price: { min: 200_000, max: 400_000 },
        yearBuilt: { min: 1980 },
      },
      features: ["hasGarage"],
    },
    indexes.hashSet,
    indexes.postingList,
    { limit: 0 }
  );
  console.log(
    `✅ ${ranged.total} homes; hash-set ${ranged.hashSetElapsedMs?.toFixed(3)}ms, ` +
      `posting-list ${ranged.postingListElapsedMs?.toFixed(3)}ms`
  );

  // Structural check of both indexes
  const report = verifyIndexes(indexes);
  console.log(`\n🧪 Verification: ${report.ok ? "consistent" : report.problems.join("; ")}`);
}

main();
