import { type FeedItem, type SlotData, slotIdentifier } from "../feed/types";
import { type ResourceDisambiguationPolicy, squashCourtPolicy } from "./policy";

export interface SlotPeriod {
  start: string;
  end: string;
  remaining: number;
}

export interface ResourceAvailability {
  resourceId: string;
  isAvailable: boolean;
  maxRemainingUses: number;
  periods: SlotPeriod[];
}

export type ResourceMap = Record<string, ResourceAvailability>;

/**
 * Either availability per named resource, or only the knowledge that some
 * resource is free during the listed periods.
 */
export type AggregationResult =
  | { kind: "per-resource"; resources: ResourceMap }
  | { kind: "partial-booking"; periods: SlotPeriod[] };

function periodOf(slot: SlotData, remaining: number): SlotPeriod {
  return { start: slot.startDate ?? "", end: slot.endDate ?? "", remaining };
}

function record(resources: ResourceMap, name: string, resourceId: string, slot: SlotData) {
  const remaining = slot.remainingUses ?? 0;
  const entry = (resources[name] ??= {
    resourceId,
    isAvailable: false,
    maxRemainingUses: 0,
    periods: [],
  });

  entry.maxRemainingUses = Math.max(entry.maxRemainingUses, remaining);
  if (remaining > 0) {
    entry.isAvailable = true;
  }
  entry.periods.push(periodOf(slot, remaining));
}

/**
 * One record for a start time: the feed has not split the period per resource.
 * Returns the period a partially booked record leaves free, if any.
 */
function processSingleSlot(
  item: FeedItem,
  resources: ResourceMap,
  policy: ResourceDisambiguationPolicy
): SlotPeriod | null {
  const slot = item.data;
  if (!slot) return null;

  const identifier = slotIdentifier(item) ?? "Unknown";

  if (slot.locations.length === 0) {
    record(resources, policy.fallbackName(identifier), identifier, slot);
  } else {
    for (const location of slot.locations) {
      const name = location.name || policy.fallbackName(location.identifier ?? "");
      record(resources, name, location.identifier || identifier, slot);
    }
  }

  return policy.isPartialBooking(slot) ? periodOf(slot, 1) : null;
}

function processMultipleCourtSlots(
  group: FeedItem[],
  resources: ResourceMap,
  policy: ResourceDisambiguationPolicy
) {
  for (const { item, resource } of policy.resolveSplitGroup(group)) {
    if (item.data) {
      record(resources, resource.name, resource.id, item.data);
    }
  }
}

function byStart(a: SlotPeriod, b: SlotPeriod): number {
  return a.start < b.start ? -1 : a.start > b.start ? 1 : 0;
}

/**
 * Rebuild per-resource availability for one window's filtered items.
 *
 * Items are grouped by their exact `startDate` string. A partially booked
 * period anywhere in the window turns the whole result into a
 * `partial-booking` signal.
 */
export function aggregateByResource(
  items: FeedItem[],
  policy: ResourceDisambiguationPolicy = squashCourtPolicy
): AggregationResult {
  const groups = new Map<string, FeedItem[]>();
  for (const item of items) {
    if (!item.data) continue;
    const key = item.data.startDate ?? "";
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  // Keys are feed-supplied names, so no inherited members may shadow them
  const resources: ResourceMap = Object.create(null);
  const partialPeriods: SlotPeriod[] = [];

  for (const group of groups.values()) {
    if (group.length === 1) {
      const freed = processSingleSlot(group[0], resources, policy);
      if (freed) partialPeriods.push(freed);
    } else {
      processMultipleCourtSlots(group, resources, policy);
    }
  }

  if (partialPeriods.length > 0) {
    return { kind: "partial-booking", periods: partialPeriods.sort(byStart) };
  }
  return { kind: "per-resource", resources };
}

export function toResourceMap(
  result: AggregationResult,
  policy: ResourceDisambiguationPolicy = squashCourtPolicy
): ResourceMap {
  if (result.kind === "per-resource") {
    return result.resources;
  }

  const { name, id } = policy.partialBookingResource;
  return {
    [name]: {
      resourceId: id,
      isAvailable: true,
      maxRemainingUses: Math.max(...result.periods.map((p) => p.remaining)),
      periods: result.periods,
    },
  };
}

export function countAvailable(resources: ResourceMap): number {
  return Object.values(resources).filter((r) => r.isAvailable).length;
}

/**
 * Names of resources free in both maps, sorted.
 */
export function availableInBoth(first: ResourceMap, second: ResourceMap): string[] {
  return Object.keys(first)
    .filter((name) => first[name].isAvailable && second[name]?.isAvailable === true)
    .sort();
}
