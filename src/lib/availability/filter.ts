import { MalformedRecordError } from "../errors";
import type { FeedItem } from "../feed/types";
import { type WindowQuery, calendarDate, parseFeedTimestamp, timeOverlaps } from "./time";

/**
 * Substring match against `facilityUse`: the feed embeds the facility id in a
 * longer URI. An id that is a substring of another facility's URI would also
 * match.
 */
export function isResourceClass(facilityUse: string | undefined, resourceClassIds: string[]): boolean {
  if (!facilityUse) return false;
  return resourceClassIds.some((id) => facilityUse.includes(id));
}

/**
 * Keep the items of the resource class that start on one of the window's dates
 * and overlap the window. Items with unreadable timestamps are dropped.
 */
export function filterByClassAndWindow(
  items: FeedItem[],
  resourceClassIds: string[],
  window: WindowQuery,
  utcOffsetMinutes: number
): FeedItem[] {
  const filtered: FeedItem[] = [];

  for (const item of items) {
    const slot = item.data;
    if (!slot) continue;
    if (!isResourceClass(slot.facilityUse, resourceClassIds)) continue;

    let start: Date;
    let end: Date;
    try {
      start = parseFeedTimestamp("startDate", slot.startDate, utcOffsetMinutes);
      end = parseFeedTimestamp("endDate", slot.endDate, utcOffsetMinutes);
    } catch (error) {
      if (error instanceof MalformedRecordError) continue;
      throw error;
    }

    const day = calendarDate(start, utcOffsetMinutes);
    if (day !== window.date && day !== window.endDate) continue;
    if (!timeOverlaps(start, end, window.start, window.end)) continue;

    filtered.push(item);
  }

  return filtered;
}
