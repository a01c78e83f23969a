#!/usr/bin/env npx tsx
/**
 * Squash Court Checker
 *
 * Checks a 40-minute squash booking and the 40 minutes before it against the
 * facility's live slot feed.
 *
 * Usage:
 *   npx tsx scripts/check-availability.ts --start-time 10:00 [--date 2026-02-03] [--format json|text]
 *
 * The date defaults to today at the feed's offset. JSON goes to stdout, feed
 * progress to stderr.
 */

import "dotenv/config";
import { FEED_UTC_OFFSET } from "../src/lib/constants";
import { checkAvailability, isFailedReport } from "../src/lib/checker";
import { parseCliArgs } from "../src/lib/cli-args";
import { formatTextReport } from "../src/lib/report-format";
import { calendarDate, parseUtcOffset } from "../src/lib/availability/time";

const stderr = new console.Console({ stdout: process.stderr, stderr: process.stderr });

function showHelp() {
  console.log(`
Squash Court Checker

Usage:
  npx tsx scripts/check-availability.ts --start-time HH:MM [--date YYYY-MM-DD] [--format json|text]

Options:
  --start-time   Start of the 40-minute booking (required)
  --date         Date of the booking, defaults to today
  --format       json (default) or text

Environment:
  FEED_URL, FEED_UTC_OFFSET, FEED_MAX_PAGES, FEED_TIMEOUT_MS, FEED_PROXY_URL
`);
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    return;
  }
  if (!args.startTime) {
    showHelp();
    process.exitCode = 1;
    return;
  }

  const date = args.date ?? calendarDate(new Date(), parseUtcOffset(FEED_UTC_OFFSET));
  const result = await checkAvailability(date, args.startTime, { logger: stderr });

  if (args.format === "text") {
    console.log(formatTextReport(result));
  } else {
    console.log(JSON.stringify(result, null, 2));
  }

  if (isFailedReport(result)) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  stderr.error(`❌ Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
