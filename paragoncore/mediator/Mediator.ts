// paragoncore/mediator/Mediator.ts
// ------------------------------------------------------------
// Ordered hook registry between the paragon engine and optional
// behaviour (multipliers, notifications, allocation rules).
//
// Handlers run in registration order. Each one sees the record as
// left by the previous handler and may return replacements for its
// writable fields. There is no priority, no cancellation and no
// unregistration: a handler that wants to stop an effect does it
// through the values it returns (e.g. amount: 0).
//
// The table is filled during startup and then sealed; firing reads
// it without locking.
// ------------------------------------------------------------

import { Logger } from "../utils/logger";
import type {
  HookHandler,
  ParagonHookArgs,
  ParagonHookName,
} from "./ParagonHooks";

const log = Logger.scope("MEDIATOR");

type HandlerTable = { [K in ParagonHookName]: HookHandler<K>[] };

function emptyTable(): HandlerTable {
  return {
    BeforeExperienceGrant: [],
    ExperienceCalculated: [],
    AfterExperienceGrant: [],
    LevelChanged: [],
    BeforeInvestment: [],
    StatChanged: [],
    BonusesSynced: [],
  };
}

// A field returned as undefined leaves the threaded value in place.
function definedFields<R extends object>(replacement: R): Partial<R> {
  const out: Partial<R> = {};
  for (const key in replacement) {
    const value = replacement[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export class Mediator {
  private readonly handlers: HandlerTable = emptyTable();
  private sealed = false;

  /** Append a handler to the hook's chain. */
  register<K extends ParagonHookName>(hook: K, handler: HookHandler<K>): void {
    if (this.sealed) {
      throw new Error(`Mediator is sealed; cannot register a handler for ${hook}`);
    }

    this.handlers[hook].push(handler);
    log.debug(`Handler registered for hook: ${hook}`, {
      position: this.handlers[hook].length,
    });
  }

  /** End of startup. Registration after this throws. */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  handlerCount(hook: ParagonHookName): number {
    return this.handlers[hook].length;
  }

  /**
   * Thread `args` through the hook's handlers and return the final record.
   *
   * A hook with no handlers returns `args` itself. Only fields a handler
   * returns with a value replace the threaded ones. A handler that throws is
   * logged and skipped; the chain continues with the values it was given.
   */
  fire<K extends ParagonHookName>(hook: K, args: ParagonHookArgs[K]): ParagonHookArgs[K] {
    const chain: HookHandler<K>[] = this.handlers[hook];
    if (chain.length === 0) return args;

    let current = args;
    for (let i = 0; i < chain.length; i++) {
      const handler = chain[i];
      try {
        const replacement = handler(current);
        if (replacement) {
          current = Object.assign({}, current, definedFields(replacement));
        }
      } catch (err) {
        log.error(`Handler error on hook ${hook}`, { position: i + 1, err });
      }
    }

    return current;
  }
}
