import type { FeedItem, ResourceLocation } from "./feed/types";

export const SQUASH_FACILITY_USE = "https://opendata.leisurecloud.live/api/facility-uses/041A000005";
export const SWIM_FACILITY_USE = "https://opendata.leisurecloud.live/api/facility-uses/041A000012";

export interface SlotFixture {
  identifier?: string;
  facilityUse?: string;
  startDate?: string;
  endDate?: string;
  remainingUses?: number;
  price?: number;
  locations?: ResourceLocation[];
}

/**
 * A parsed squash slot, 10:00-10:40 UTC on 2026-02-03 with one use left at £10.25 unless overridden.
 */
export function makeItem(fixture: SlotFixture = {}): FeedItem {
  const identifier = fixture.identifier ?? "slot-1";
  return {
    identifier,
    state: "updated",
    kind: "Slot",
    data: {
      identifier,
      facilityUse: fixture.facilityUse ?? SQUASH_FACILITY_USE,
      startDate: fixture.startDate ?? "2026-02-03T10:00:00Z",
      endDate: fixture.endDate ?? "2026-02-03T10:40:00Z",
      remainingUses: fixture.remainingUses ?? 1,
      offers: [{ price: fixture.price ?? 10.25, priceCurrency: "GBP" }],
      locations: fixture.locations ?? [],
    },
  };
}

export const BOTH_COURTS: ResourceLocation[] = [
  { name: "Squash Court 1", identifier: "041ZSQU001" },
  { name: "Squash Court 2", identifier: "041ZSQU002" },
];
