import { z } from "zod";

// The feed publishes court locations under a vendor extension key
export const LOCATION_KEY = "beta:sportsActivityLocation";

const optionalString = z.string().optional().catch(undefined);

export const resourceLocationSchema = z.object({
  name: z.string().optional().catch(undefined),
  identifier: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
});

export const offerSchema = z.object({
  price: z.coerce.number().optional().catch(undefined),
  priceCurrency: optionalString,
});

export const slotDataSchema = z
  .object({
    identifier: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
    facilityUse: optionalString,
    startDate: optionalString,
    endDate: optionalString,
    remainingUses: z.number().int().nonnegative().optional().catch(undefined),
    offers: z.array(offerSchema).optional().catch(undefined),
    [LOCATION_KEY]: z.array(resourceLocationSchema).optional().catch(undefined),
  })
  .transform(({ [LOCATION_KEY]: locations, ...rest }) => ({ ...rest, locations: locations ?? [] }));

export const feedItemSchema = z.object({
  identifier: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  state: optionalString,
  kind: optionalString,
  modified: z.union([z.string(), z.number()]).optional().catch(undefined),
  // Deleted items carry no data; unreadable data is treated the same way
  data: slotDataSchema.nullish().catch(null),
});

export const feedPageSchema = z.object({
  items: z.array(feedItemSchema),
  next: z.string().nullish(),
});

export type ResourceLocation = z.infer<typeof resourceLocationSchema>;
export type Offer = z.infer<typeof offerSchema>;
export type SlotData = z.infer<typeof slotDataSchema>;
export type FeedItem = z.infer<typeof feedItemSchema>;
export type FeedPage = z.infer<typeof feedPageSchema>;

/**
 * Identifier used to name and order a slot: the slot's own id, else the envelope's.
 */
export function slotIdentifier(item: FeedItem): string | undefined {
  return item.data?.identifier ?? item.identifier;
}

export function firstOfferPrice(slot: SlotData): number {
  return slot.offers?.[0]?.price ?? 0;
}
