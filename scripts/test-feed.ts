/**
 * Fetch the whole live feed and print a sample of the squash slots in it
 *
 * Run: npx tsx scripts/test-feed.ts
 */

import "dotenv/config";
import { ALFRETON_SQUASH } from "../src/lib/constants";
import { FeedPaginator } from "../src/lib/feed/paginator";
import { LOCATION_KEY, firstOfferPrice, slotIdentifier } from "../src/lib/feed/types";
import { isResourceClass } from "../src/lib/availability/filter";
import { formatBytes, proxyManager } from "../src/lib/proxy-manager";

async function main() {
  const facility = ALFRETON_SQUASH;
  console.log("=".repeat(60));
  console.log(`FEED TEST - ${facility.name}`);
  console.log("=".repeat(60));

  const items = await new FeedPaginator({ baseUrl: facility.feedUrl }).fetchAll();
  const squash = items.filter((item) => isResourceClass(item.data?.facilityUse, facility.facilityUseIds));
  const deleted = items.filter((item) => item.state === "deleted").length;

  console.log(`\nFound ${items.length} items (${deleted} deleted), ${squash.length} squash slots`);

  // Group by start time for readability
  const byStart: Record<string, typeof squash> = {};
  for (const item of squash) {
    const start = item.data?.startDate ?? "unknown";
    if (!byStart[start]) byStart[start] = [];
    byStart[start].push(item);
  }

  const starts = Object.keys(byStart).sort().slice(0, 5);
  for (const start of starts) {
    const summary = byStart[start]
      .map((item) => {
        const slot = item.data;
        if (!slot) return "(no data)";
        const courts = slot.locations.map((loc) => loc.name || loc.identifier).join("+") || "no location";
        return `${slotIdentifier(item)} [${courts}] remaining ${slot.remainingUses ?? 0}, £${firstOfferPrice(slot).toFixed(2)}`;
      })
      .join(" | ");
    console.log(`${start}: ${summary}`);
  }
  if (Object.keys(byStart).length > starts.length) {
    console.log(`... and ${Object.keys(byStart).length - starts.length} more start times`);
  }
  console.log(`\nLocations are read from "${LOCATION_KEY}"`);

  const stats = proxyManager.getStats();
  console.log(`📊 ${stats.totalRequests} requests, ${formatBytes(stats.totalBytes)}${stats.configured ? " via proxy" : ""}`);
}

main().catch(console.error);
