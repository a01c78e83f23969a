import { ALFRETON_SQUASH, type Court } from "../constants";
import { type FeedItem, type SlotData, firstOfferPrice, slotIdentifier } from "../feed/types";

export interface ResourceAssignment {
  item: FeedItem;
  resource: Court;
}

/**
 * Provider-specific knowledge about which physical resource a feed record
 * refers to when the record itself does not say reliably.
 */
export interface ResourceDisambiguationPolicy {
  // Entry reported when a window only shows that some resource is free
  partialBookingResource: Court;
  fallbackName(identifier: string): string;
  isPartialBooking(slot: SlotData): boolean;
  // Several records share one start time: one record per resource
  resolveSplitGroup(items: FeedItem[]): ResourceAssignment[];
}

function byIdentifier(a: FeedItem, b: FeedItem): number {
  const left = slotIdentifier(a) ?? "";
  const right = slotIdentifier(b) ?? "";
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Policy for a venue with exactly two courts of one class.
 *
 * Once the feed splits a period per court, the free court's record shows
 * remaining uses and a price, while the booked court's record shows neither.
 * The free record is assigned to the second court, every other record to the
 * first. When the feed collapses a half-booked period it sends one record with
 * no remaining uses, a price, and both courts as locations.
 */
export function createTwoCourtPolicy(courts: [Court, Court]): ResourceDisambiguationPolicy {
  const [bookedCourt, freeCourt] = courts;

  return {
    partialBookingResource: { name: "Available Courts", id: "partial_booking" },

    fallbackName(identifier) {
      return `Squash Court (${identifier})`;
    },

    isPartialBooking(slot) {
      return (slot.remainingUses ?? 0) === 0 && firstOfferPrice(slot) > 0 && slot.locations.length === 2;
    },

    resolveSplitGroup(items) {
      return [...items].sort(byIdentifier).map((item) => {
        const slot = item.data;
        const remaining = slot?.remainingUses ?? 0;
        const price = slot ? firstOfferPrice(slot) : 0;
        const target = remaining > 0 && price > 0 ? freeCourt : bookedCourt;

        // Trust the record's own location id when it names the inferred court
        const location = slot?.locations.find((loc) => loc.name === target.name);
        const resource = location?.identifier ? { name: target.name, id: location.identifier } : target;

        return { item, resource };
      });
    },
  };
}

export const squashCourtPolicy = createTwoCourtPolicy(ALFRETON_SQUASH.courts);
