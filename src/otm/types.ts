/**
 * OTM REST resource shapes (external API contract), validated with Zod.
 * Used only inside the OTM adapter; domain types stay in domain/.
 */

import { z } from "zod";

/**
 * A field OTM may omit, null out or send in an unexpected type.
 * Anything that does not match reads as null; it never rejects the item.
 */
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(null);
}

const scalarSchema = z.union([z.number(), z.string()]);

export const otmLinkSchema = z.object({
  rel: lenient(z.string()),
  href: lenient(z.string()),
});

/** A referenced resource that is not expanded: only its links come back */
const otmLinkedSchema = lenient(z.object({ links: lenient(z.array(otmLinkSchema)) }));

const otmDateSchema = lenient(z.object({ value: lenient(z.string()) }));

const otmMeasureSchema = lenient(
  z.object({ value: lenient(scalarSchema), unit: lenient(z.string()) })
);

const otmCurrencySchema = lenient(
  z.object({ value: lenient(scalarSchema), currency: lenient(z.string()) })
);

export const otmStatusItemSchema = z.object({
  statusTypeGid: lenient(z.string()),
  statusValueGid: lenient(z.string()),
  updateDate: otmDateSchema,
  insertDate: otmDateSchema,
});

const otmStatusesSchema = lenient(z.object({ items: lenient(z.array(otmStatusItemSchema)) }));

/** Numeric XIDs are read as their decimal string */
const otmXidSchema = lenient(z.union([z.string(), z.number().transform(String)]));

/** Only a non-object item fails; every field degrades to null on its own */
export const otmShipmentSchema = z.object({
  shipmentXid: otmXidSchema,
  shipmentName: lenient(z.string()),
  transportModeGid: lenient(z.string()),
  servprov: otmLinkedSchema,
  sourceLocation: otmLinkedSchema,
  destLocation: otmLinkedSchema,
  startTime: otmDateSchema,
  endTime: otmDateSchema,
  insertDate: otmDateSchema,
  updateDate: otmDateSchema,
  totalWeight: otmMeasureSchema,
  totalVolume: otmMeasureSchema,
  totalActualCost: otmCurrencySchema,
  shipmentAsWork: lenient(z.union([z.boolean(), z.string()])),
  perspective: lenient(z.string()),
  attribute10: lenient(z.string()),
  statuses: otmStatusesSchema,
});

/** Collection envelope returned by saved-query custom actions */
export const otmCollectionSchema = z.object({
  items: z.array(z.unknown()).nullish(),
  count: z.number().nullish(),
  hasMore: z.boolean().nullish(),
});

export type OtmLink = z.infer<typeof otmLinkSchema>;
export type OtmStatusItem = z.infer<typeof otmStatusItemSchema>;
export type OtmShipment = z.infer<typeof otmShipmentSchema>;
export type OtmStatuses = OtmShipment["statuses"];
