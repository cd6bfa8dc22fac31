// paragoncore/protocol/AddonProtocol.ts
//
// Messages exchanged with the client addon over the host's prefixed
// request/response channel. Framing belongs to the host; this module only
// defines the payloads.

import { z } from "zod";

import type { ParagonCatalogue } from "../paragon/ParagonCatalogue";
import type { ParagonState } from "../paragon/ParagonState";
import type { InvestmentRequest, StatKind } from "../paragon/ParagonTypes";

export const ADDON_PREFIX = "ParagonAnniversary";

// -------------------------
// Client -> server
// -------------------------

export const investmentEntrySchema = z.object({
  categoryId: z.number().int(),
  statId: z.number().int(),
  value: z.number(),
});

export const addonRequestSchema = z.discriminatedUnion("op", [
  z.object({ prefix: z.literal(ADDON_PREFIX), op: z.literal("load") }),
  z.object({
    prefix: z.literal(ADDON_PREFIX),
    op: z.literal("update"),
    // entries are parsed one by one in parseInvestmentEntries
    stats: z.array(z.unknown()),
  }),
]);

export interface ParsedEntries {
  requests: InvestmentRequest[];
  // index of the first malformed entry; entries after it are not read
  malformedIndex: number | null;
}

export function parseInvestmentEntries(raw: readonly unknown[]): ParsedEntries {
  const requests: InvestmentRequest[] = [];

  for (let i = 0; i < raw.length; i++) {
    const parsed = investmentEntrySchema.safeParse(raw[i]);
    if (!parsed.success) {
      return { requests, malformedIndex: i };
    }
    requests.push(parsed.data);
  }

  return { requests, malformedIndex: null };
}

// -------------------------
// Server -> client
// -------------------------

export interface AddonStatView {
  id: number;
  kind: StatKind;
  targetCode: number;
  icon: string;
  factor: number;
  limit: number;
  application: number;
  // what the subject has invested
  assigned: number;
}

export interface AddonCategoryView {
  id: number;
  name: string;
  stats: AddonStatView[];
}

export interface AddonLoadPayload {
  level: number;
  experience: { current: number; max: number };
  points: number;
  categories: AddonCategoryView[];
}

export type AddonServerMessage =
  | { prefix: typeof ADDON_PREFIX; op: "load"; payload: AddonLoadPayload }
  | { prefix: typeof ADDON_PREFIX; op: "notice"; level: "info" | "error"; text: string };

/** Full catalogue annotated with the subject's current investment per stat. */
export function buildLoadPayload(catalogue: ParagonCatalogue, state: ParagonState): AddonLoadPayload {
  const categories = catalogue
    .getCategories()
    .sort((a, b) => a.id - b.id)
    .map((category) => ({
      id: category.id,
      name: category.name,
      stats: [...category.stats.values()]
        .sort((a, b) => a.id - b.id)
        .map((def) => ({
          id: def.id,
          kind: def.kind,
          targetCode: def.targetCode,
          icon: def.icon,
          factor: def.factor,
          limit: def.limit,
          application: def.applicationCode,
          assigned: state.getInvestment(def.id),
        })),
    }));

  return {
    level: state.level,
    experience: { current: state.experience.current, max: state.experience.requiredForNext },
    points: state.points,
    categories,
  };
}

export function loadMessage(payload: AddonLoadPayload): AddonServerMessage {
  return { prefix: ADDON_PREFIX, op: "load", payload };
}

export function noticeMessage(level: "info" | "error", text: string): AddonServerMessage {
  return { prefix: ADDON_PREFIX, op: "notice", level, text };
}
