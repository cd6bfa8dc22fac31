// paragoncore/protocol/ParagonAddonHandler.ts

import type { ParagonCatalogue } from "../paragon/ParagonCatalogue";
import type { ParagonEngine } from "../paragon/ParagonEngine";
import type { ParagonState } from "../paragon/ParagonState";
import type { InvestmentBatchResult, InvestmentFailure } from "../paragon/ParagonTypes";
import { Logger } from "../utils/logger";
import {
  addonRequestSchema,
  buildLoadPayload,
  loadMessage,
  noticeMessage,
  parseInvestmentEntries,
  type AddonServerMessage,
} from "./AddonProtocol";

const log = Logger.scope("ADDON");

/** Host-owned transport back to one subject's client. */
export interface AddonChannel {
  send(subjectId: number, message: AddonServerMessage): void;
}

const FAILURE_TEXT: Record<InvestmentFailure, string> = {
  InvalidStat: "Unknown paragon statistic.",
  InvalidValue: "Invalid paragon value.",
  LimitExceeded: "Paragon statistic limit exceeded.",
  InsufficientPoints: "Not enough paragon points.",
};

export type AddonHandleResult =
  | { handled: "load" }
  | { handled: "update"; result: InvestmentBatchResult }
  | { handled: "rejected"; error: "bad_request" | "empty_update" };

/**
 * Routes addon requests for a subject whose state is loaded. Every update is
 * answered with a fresh load so the client always renders committed values.
 */
export class ParagonAddonHandler {
  constructor(
    private readonly catalogue: ParagonCatalogue,
    private readonly engine: ParagonEngine,
    private readonly channel: AddonChannel,
  ) {}

  sendLoad(state: ParagonState): void {
    this.channel.send(state.subjectId, loadMessage(buildLoadPayload(this.catalogue, state)));
  }

  handle(state: ParagonState, raw: unknown): AddonHandleResult {
    const parsed = addonRequestSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("Bad addon request", { subjectId: state.subjectId, issues: parsed.error.issues.length });
      this.channel.send(state.subjectId, noticeMessage("error", "Bad paragon request."));
      return { handled: "rejected", error: "bad_request" };
    }

    const request = parsed.data;
    if (request.op === "load") {
      this.sendLoad(state);
      return { handled: "load" };
    }

    if (request.stats.length === 0) {
      this.channel.send(state.subjectId, noticeMessage("error", "Empty paragon update."));
      return { handled: "rejected", error: "empty_update" };
    }

    const { requests, malformedIndex } = parseInvestmentEntries(request.stats);
    let result = this.engine.applyInvestmentBatch(state, requests);

    if (!result.rejected && !result.budgetRejected && malformedIndex !== null) {
      result = {
        ...result,
        rejected: { index: malformedIndex, reason: "InvalidValue" },
      };
    }

    if (result.budgetRejected) {
      this.channel.send(state.subjectId, noticeMessage("error", FAILURE_TEXT.InsufficientPoints));
    } else if (result.rejected) {
      this.channel.send(state.subjectId, noticeMessage("error", FAILURE_TEXT[result.rejected.reason]));
    }

    log.debug("Addon update handled", {
      subjectId: state.subjectId,
      applied: result.applied.length,
      rejected: result.rejected?.reason ?? null,
      budgetRejected: result.budgetRejected,
    });

    this.sendLoad(state);
    return { handled: "update", result };
  }
}
