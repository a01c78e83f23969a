import { ALFRETON_SQUASH, FEED_UTC_OFFSET, WINDOW_MINUTES, type Facility } from "./constants";
import { errorMessage } from "./errors";
import { type FeedLogger, FeedPaginator } from "./feed/paginator";
import type { FeedItem } from "./feed/types";
import {
  type AggregationResult,
  type ResourceMap,
  aggregateByResource,
  availableInBoth,
  countAvailable,
  toResourceMap,
} from "./availability/aggregate";
import { filterByClassAndWindow } from "./availability/filter";
import { type ResourceDisambiguationPolicy, squashCourtPolicy } from "./availability/policy";
import { type WindowQuery, buildWindowPair, parseUtcOffset } from "./availability/time";
import { getBookingUrl } from "./utils/link-helpers";

export interface TimeRange {
  start: string;
  end: string;
}

export interface AvailabilityReport {
  // At least one court is free in the window before the booking
  success: boolean;
  message: string;
  mainSlotAvailable: number;
  beforeSlotAvailable: number;
  availableForBoth: string[];
  partialBooking: { main: boolean; before: boolean };
  bookingUrl: string;
  mainCourtInfo: ResourceMap;
  beforeCourtInfo: ResourceMap;
  timeSlots: { main: TimeRange; before: TimeRange };
}

export interface FailedReport {
  success: false;
  message: string;
  bookingUrl: string;
  error: string;
}

export type CheckResult = AvailabilityReport | FailedReport;

export interface CheckOptions {
  facility?: Facility;
  // UTC offset of the feed's wall-clock times, e.g. "+01:00"
  utcOffset?: string;
  policy?: ResourceDisambiguationPolicy;
  feed?: { fetchAll(): Promise<FeedItem[]> };
  logger?: FeedLogger;
}

export function isFailedReport(result: CheckResult): result is FailedReport {
  return "error" in result;
}

export function beforeSlotMessage(freeCount: number): string {
  if (freeCount === 0) return "There is no slots free before your booking";
  if (freeCount === 1) return "There is one slot free before your booking";
  return `There are ${freeCount} slots free before your booking`;
}

function resolveWindow(
  items: FeedItem[],
  facility: Facility,
  window: WindowQuery,
  offsetMinutes: number,
  policy: ResourceDisambiguationPolicy
): AggregationResult {
  const inWindow = filterByClassAndWindow(items, facility.facilityUseIds, window, offsetMinutes);
  return aggregateByResource(inWindow, policy);
}

/**
 * Check a booking window and the window before it against the live feed.
 * @param date - YYYY-MM-DD
 * @param startTime - HH:MM, wall-clock time at the feed's offset
 * @throws InputFormatError before any request when the input is unreadable
 * @throws TransportError when the feed cannot be read
 */
export async function checkSquashAvailability(
  date: string,
  startTime: string,
  options: CheckOptions = {}
): Promise<AvailabilityReport> {
  const facility = options.facility ?? ALFRETON_SQUASH;
  const policy = options.policy ?? squashCourtPolicy;
  const offsetMinutes = parseUtcOffset(options.utcOffset ?? FEED_UTC_OFFSET);
  const windows = buildWindowPair(date, startTime, WINDOW_MINUTES, offsetMinutes);

  const feed = options.feed ?? new FeedPaginator({ baseUrl: facility.feedUrl, logger: options.logger });
  const items = await feed.fetchAll();

  const main = resolveWindow(items, facility, windows.main, offsetMinutes, policy);
  const before = resolveWindow(items, facility, windows.before, offsetMinutes, policy);

  const mainCourtInfo = toResourceMap(main, policy);
  const beforeCourtInfo = toResourceMap(before, policy);
  const beforeSlotAvailable = countAvailable(beforeCourtInfo);

  return {
    success: beforeSlotAvailable > 0,
    message: beforeSlotMessage(beforeSlotAvailable),
    mainSlotAvailable: countAvailable(mainCourtInfo),
    beforeSlotAvailable,
    availableForBoth: availableInBoth(mainCourtInfo, beforeCourtInfo),
    partialBooking: {
      main: main.kind === "partial-booking",
      before: before.kind === "partial-booking",
    },
    bookingUrl: getBookingUrl(facility, windows.before.start),
    mainCourtInfo,
    beforeCourtInfo,
    timeSlots: {
      main: { start: windows.main.startLabel, end: windows.main.endLabel },
      before: { start: windows.before.startLabel, end: windows.before.endLabel },
    },
  };
}

/**
 * Same as `checkSquashAvailability`, but every failure comes back as a
 * `FailedReport` instead of being thrown.
 */
export async function checkAvailability(
  date: string,
  startTime: string,
  options: CheckOptions = {}
): Promise<CheckResult> {
  try {
    return await checkSquashAvailability(date, startTime, options);
  } catch (error) {
    const message = errorMessage(error);
    (options.logger ?? console).error(`❌ Availability check failed: ${message}`);
    return {
      success: false,
      message: `Error checking availability: ${message}`,
      bookingUrl: getBookingUrl(options.facility ?? ALFRETON_SQUASH),
      error: message,
    };
  }
}
