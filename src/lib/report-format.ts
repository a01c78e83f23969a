import { ALFRETON_SQUASH, type Facility } from "./constants";
import type { ResourceMap } from "./availability/aggregate";
import { type CheckResult, type TimeRange, isFailedReport } from "./checker";

const RULE = "=".repeat(60);
const SUBRULE = "-".repeat(40);

function windowSection(title: string, range: TimeRange, courts: ResourceMap, partial: boolean, facility: Facility): string[] {
  const lines = ["", `${title} (${range.start}-${range.end}):`, SUBRULE];

  const available: string[] = [];
  const booked: string[] = [];
  for (const [name, court] of Object.entries(courts)) {
    if (court.isAvailable) {
      available.push(`  • ${name} - ${court.maxRemainingUses} slots available`);
    } else {
      booked.push(`  • ${name} - Fully booked`);
    }
  }

  if (available.length > 0) {
    lines.push(`✅ AVAILABLE SQUASH COURTS (${available.length}):`, ...available);
    if (partial) {
      lines.push(
        "",
        "📋 NOTE: Specific court availability not available in feed data",
        "🔗 See which court is available:",
        `   ${facility.bookingUrl}`
      );
    }
  }
  if (booked.length > 0) {
    lines.push(`❌ UNAVAILABLE SQUASH COURTS (${booked.length}):`, ...booked);
  }
  if (available.length === 0 && booked.length === 0) {
    lines.push("  No squash slots found in this window.");
  }

  return lines;
}

/**
 * Render a check result as a human-readable console report.
 */
export function formatTextReport(result: CheckResult, facility: Facility = ALFRETON_SQUASH): string {
  if (isFailedReport(result)) {
    return [`❌ ${result.message}`, `🔗 ${result.bookingUrl}`].join("\n");
  }

  const lines = [
    RULE,
    `SQUASH COURT AVAILABILITY REPORT - ${facility.name}`,
    RULE,
    ...windowSection("Main Slot", result.timeSlots.main, result.mainCourtInfo, result.partialBooking.main, facility),
    ...windowSection(
      "Before Slot",
      result.timeSlots.before,
      result.beforeCourtInfo,
      result.partialBooking.before,
      facility
    ),
    "",
    "SQUASH COURTS AVAILABLE FOR BOTH SLOTS:",
    SUBRULE,
  ];

  if (result.availableForBoth.length > 0) {
    lines.push("  🎯 Courts available for both time slots:", ...result.availableForBoth.map((name) => `    ${name}`));
  } else {
    lines.push("  No squash courts available for both time slots.");
  }

  lines.push("", result.message, `🔗 ${result.bookingUrl}`, RULE);
  return lines.join("\n");
}
