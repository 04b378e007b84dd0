/**
 * @mirrorline/event-store — Configuration event definitions.
 *
 * The catalog of payload types the replica understands, with their
 * current schema versions and the migrations from older versions.
 *
 * Naming convention: `<entity>.<action>`
 */

import { z } from "zod";
import type { ConfigPayload } from "@mirrorline/types";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payload schemas (current versions)
// =============================================================================

const RateSchema = z.number().finite();

export const MarkupUpdatedSchema = z.object({
  type: z.literal("markup.updated"),
  category: z.string().min(1),
  rate: RateSchema,
});

export const BrandUpdatedSchema = z.object({
  type: z.literal("brand.updated"),
  code: z.string().min(1),
  name: z.string(),
});

export const BrandRemovedSchema = z.object({
  type: z.literal("brand.removed"),
  code: z.string().min(1),
});

export const DefaultMarkupSetSchema = z.object({
  type: z.literal("default-markup.set"),
  rate: RateSchema,
});

export const ConfigPayloadSchema: z.ZodType<ConfigPayload> = z.discriminatedUnion("type", [
  MarkupUpdatedSchema,
  BrandUpdatedSchema,
  BrandRemovedSchema,
  DefaultMarkupSetSchema,
]);

// =============================================================================
// Catalog
// =============================================================================

/**
 * Current schema version of every payload type.
 */
export const CONFIG_EVENTS = {
  "markup.updated": 2,
  "brand.updated": 1,
  "brand.removed": 1,
  "default-markup.set": 1,
} as const satisfies Record<ConfigPayload["type"], number>;

/**
 * Build a catalog with every configuration payload type registered.
 *
 * History:
 * - markup.updated v1 carried `{ productType, price }`; v2 renamed them
 *   to `{ category, rate }`
 */
export function createConfigCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  catalog.register({
    type: "markup.updated",
    version: CONFIG_EVENTS["markup.updated"],
    description: "A product category's markup rate was set (non-positive removes it)",
    validate: (p) => MarkupUpdatedSchema.safeParse(p).success,
  });
  catalog.registerMigration("markup.updated", 1, (payload) => {
    const { productType, price, ...rest } = payload;
    return { ...rest, category: productType, rate: price };
  });

  catalog.register({
    type: "brand.updated",
    version: CONFIG_EVENTS["brand.updated"],
    description: "A brand's display name was set",
    validate: (p) => BrandUpdatedSchema.safeParse(p).success,
  });

  catalog.register({
    type: "brand.removed",
    version: CONFIG_EVENTS["brand.removed"],
    description: "A brand code was retired",
    validate: (p) => BrandRemovedSchema.safeParse(p).success,
  });

  catalog.register({
    type: "default-markup.set",
    version: CONFIG_EVENTS["default-markup.set"],
    description: "The markup for categories without their own rate was set",
    validate: (p) => DefaultMarkupSetSchema.safeParse(p).success,
  });

  return catalog;
}
