import { describe, it, expect, vi } from "vitest";
import { checkAvailability, checkSquashAvailability, beforeSlotMessage, isFailedReport } from "./checker";
import { TransportError } from "./errors";
import type { FeedItem } from "./feed/types";
import { BOTH_COURTS, SWIM_FACILITY_USE, makeItem } from "./test-fixtures";

const CALENDAR = "https://placesleisure.gladstonego.cloud/book/calendar/041A000005";

const BEFORE = { startDate: "2026-02-03T09:20:00Z", endDate: "2026-02-03T10:00:00Z" };
const MAIN = { startDate: "2026-02-03T10:00:00Z", endDate: "2026-02-03T10:40:00Z" };

function feedOf(items: FeedItem[]) {
  return { fetchAll: vi.fn(async () => items) };
}

function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("beforeSlotMessage", () => {
  it("phrases the count of free slots", () => {
    expect(beforeSlotMessage(0)).toBe("There is no slots free before your booking");
    expect(beforeSlotMessage(1)).toBe("There is one slot free before your booking");
    expect(beforeSlotMessage(3)).toBe("There are 3 slots free before your booking");
  });
});

describe("checkSquashAvailability", () => {
  it("reports both windows for a 10:00 booking", async () => {
    const feed = feedOf([
      makeItem({ identifier: "b1", ...BEFORE, remainingUses: 1, price: 10.25 }),
      makeItem({ identifier: "b2", ...BEFORE, remainingUses: 0, price: 0 }),
      makeItem({ identifier: "m1", ...MAIN, remainingUses: 1, price: 10.25 }),
      makeItem({ identifier: "m2", ...MAIN, remainingUses: 0, price: 0 }),
      makeItem({ identifier: "swim", ...MAIN, facilityUse: SWIM_FACILITY_USE }),
    ]);

    const report = await checkSquashAvailability("2026-02-03", "10:00", { feed, utcOffset: "+00:00" });

    expect(report.success).toBe(true);
    expect(report.message).toBe("There is one slot free before your booking");
    expect(report.mainSlotAvailable).toBe(1);
    expect(report.beforeSlotAvailable).toBe(1);
    expect(report.availableForBoth).toEqual(["Squash Court 2"]);
    expect(report.partialBooking).toEqual({ main: false, before: false });
    expect(report.timeSlots).toEqual({
      main: { start: "10:00", end: "10:40" },
      before: { start: "09:20", end: "10:00" },
    });
    expect(report.bookingUrl).toBe(
      `${CALENDAR}?activityDate=2026-02-03T09:20:00.000Z&previousActivityDate=2026-02-03T08:40:00.000Z`
    );
    expect(report.beforeCourtInfo["Squash Court 2"].periods).toEqual([
      { start: BEFORE.startDate, end: BEFORE.endDate, remaining: 1 },
    ]);
    expect(report.mainCourtInfo["Squash Court 1"]).toMatchObject({ resourceId: "041ZSQU001", isAvailable: false });
    expect(feed.fetchAll).toHaveBeenCalledTimes(1);
  });

  it("is unsuccessful when nothing is free before the booking", async () => {
    const feed = feedOf([makeItem({ identifier: "m1", ...MAIN })]);

    const report = await checkSquashAvailability("2026-02-03", "10:00", { feed, utcOffset: "Z" });

    expect(report.success).toBe(false);
    expect(report.message).toBe("There is no slots free before your booking");
    expect(report.beforeCourtInfo).toEqual({});
    expect(report.mainSlotAvailable).toBe(1);
    expect(report.availableForBoth).toEqual([]);
  });

  it("counts every court a collapsed slot lists", async () => {
    const feed = feedOf([makeItem({ ...BEFORE, remainingUses: 2, locations: BOTH_COURTS })]);

    const report = await checkSquashAvailability("2026-02-03", "10:00", { feed, utcOffset: "Z" });

    expect(report.message).toBe("There are 2 slots free before your booking");
    expect(report.beforeSlotAvailable).toBe(2);
  });

  it("flags a window that only shows some court is free", async () => {
    const feed = feedOf([makeItem({ ...BEFORE, remainingUses: 0, price: 10.25, locations: BOTH_COURTS })]);

    const report = await checkSquashAvailability("2026-02-03", "10:00", { feed, utcOffset: "Z" });

    expect(report.partialBooking).toEqual({ main: false, before: true });
    expect(Object.keys(report.beforeCourtInfo)).toEqual(["Available Courts"]);
    expect(report.message).toBe("There is one slot free before your booking");
  });

  it("reads the booking time at the feed's offset", async () => {
    const feed = feedOf([
      makeItem({
        identifier: "summer",
        startDate: "2026-06-10T09:20:00+01:00",
        endDate: "2026-06-10T10:00:00+01:00",
        locations: [BOTH_COURTS[0]],
      }),
    ]);

    const report = await checkSquashAvailability("2026-06-10", "10:00", { feed, utcOffset: "+01:00" });

    expect(report.beforeSlotAvailable).toBe(1);
    expect(report.timeSlots.before).toEqual({ start: "09:20", end: "10:00" });
    expect(report.bookingUrl).toBe(
      `${CALENDAR}?activityDate=2026-06-10T08:20:00.000Z&previousActivityDate=2026-06-10T07:40:00.000Z`
    );
  });
});

describe("checkAvailability", () => {
  it("turns bad input into a failure report without reading the feed", async () => {
    const feed = feedOf([]);
    const logger = silentLogger();

    const result = await checkAvailability("2026-02-03", "25:00", { feed, logger });

    expect(result).toEqual({
      success: false,
      message: 'Error checking availability: Invalid start time "25:00"',
      bookingUrl: CALENDAR,
      error: 'Invalid start time "25:00"',
    });
    expect(isFailedReport(result)).toBe(true);
    expect(feed.fetchAll).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("turns a feed failure into a failure report", async () => {
    const url = "https://feed.test/slots?afterId=9";
    const feed = {
      fetchAll: vi.fn(async (): Promise<FeedItem[]> => {
        throw new TransportError(`Failed to fetch ${url}: 503 Service Unavailable`, url, { status: 503 });
      }),
    };

    const result = await checkAvailability("2026-02-03", "10:00", { feed, logger: silentLogger() });

    expect(result).toEqual({
      success: false,
      message: `Error checking availability: Failed to fetch ${url}: 503 Service Unavailable`,
      bookingUrl: CALENDAR,
      error: `Failed to fetch ${url}: 503 Service Unavailable`,
    });
  });

  it("passes a successful report through", async () => {
    const feed = feedOf([makeItem({ ...BEFORE })]);

    const result = await checkAvailability("2026-02-03", "10:00", { feed, utcOffset: "Z", logger: silentLogger() });

    expect(isFailedReport(result)).toBe(false);
    expect(result.success).toBe(true);
    expect(result.message).toBe("There is one slot free before your booking");
  });
});
