// paragon-server/server.ts
//
// Dev host bridge: one WebSocket per logged-in character. Stands in for the
// game host so the addon protocol and persistence can be exercised end to end.

import http from "http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";

import { InMemoryBonusApplicator } from "../paragoncore/bonuses/InMemoryBonusApplicator";
import { applyParagonSchema } from "../paragoncore/db/ParagonSchema";
import { PgSqlExecutor } from "../paragoncore/db/SqlExecutor";
import { Mediator } from "../paragoncore/mediator/Mediator";
import { registerExperienceModifiers } from "../paragoncore/modules/ExperienceModifiers";
import { ParagonCatalogue, type CatalogueSnapshot } from "../paragoncore/paragon/ParagonCatalogue";
import { ParagonEngine } from "../paragoncore/paragon/ParagonEngine";
import { SOURCE_KINDS, type ExperienceResult, type SourceKind, type SubjectRef } from "../paragoncore/paragon/ParagonTypes";
import { noticeMessage, type AddonServerMessage } from "../paragoncore/protocol/AddonProtocol";
import { ParagonAddonHandler, type AddonChannel } from "../paragoncore/protocol/ParagonAddonHandler";
import { ParagonSessionService } from "../paragoncore/sessions/ParagonSessionService";
import { FileParagonConfigSource } from "../paragoncore/storage/FileParagonConfigSource";
import { InMemoryParagonRepository } from "../paragoncore/storage/InMemoryParagonRepository";
import type { ParagonRepository } from "../paragoncore/storage/ParagonRepository";
import { PostgresParagonConfigSource } from "../paragoncore/storage/PostgresParagonConfigSource";
import { PostgresParagonRepository } from "../paragoncore/storage/PostgresParagonRepository";
import { Logger } from "../paragoncore/utils/logger";
import { serverConfig } from "./config";

const log = Logger.scope("SERVER");

const idParam = z.coerce.number().int().positive();

const devTriggerSchema = z.object({
  op: z.literal("trigger"),
  kind: z.enum(SOURCE_KINDS),
  entryId: z.number().int().nonnegative(),
});

/** Routes outgoing addon messages to the owning socket. */
class SocketChannel implements AddonChannel {
  private readonly sockets = new Map<number, WebSocket>();

  attach(subjectId: number, socket: WebSocket): void {
    this.sockets.set(subjectId, socket);
  }

  detach(subjectId: number, socket: WebSocket): void {
    if (this.sockets.get(subjectId) === socket) this.sockets.delete(subjectId);
  }

  has(subjectId: number): boolean {
    return this.sockets.has(subjectId);
  }

  send(subjectId: number, message: AddonServerMessage): void {
    const socket = this.sockets.get(subjectId);
    if (!socket || socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }
}

function parseSubject(reqUrl: string | undefined): SubjectRef | null {
  const url = new URL(reqUrl ?? "/", "ws://localhost");
  const character = idParam.safeParse(url.searchParams.get("character"));
  if (!character.success) return null;

  // account defaults to the character id for single-character dev logins
  const account = idParam.safeParse(url.searchParams.get("account") ?? character.data);
  if (!account.success) return null;

  return { characterId: character.data, accountId: account.data };
}

function routeTrigger(
  sessions: ParagonSessionService,
  characterId: number,
  kind: SourceKind,
  entryId: number,
): ExperienceResult | null {
  switch (kind) {
    case "Creature":
      return sessions.onCreatureKill(characterId, entryId);
    case "Quest":
      return sessions.onQuestComplete(characterId, entryId);
    case "Achievement":
      return sessions.onAchievementComplete(characterId, entryId);
    case "Skill":
      return sessions.onSkillUpdate(characterId, entryId);
  }
}

function decode(data: RawData): unknown {
  return JSON.parse(data.toString());
}

async function loadSnapshot(): Promise<CatalogueSnapshot> {
  if (serverConfig.useDatabase) {
    const { testDbConnection } = await import("../paragoncore/db/Database");
    if (!(await testDbConnection())) {
      throw new Error("Postgres is configured but unreachable");
    }
    const sql = new PgSqlExecutor();
    const applied = await applyParagonSchema(sql);
    log.info("Paragon schema applied", { files: applied });
    return new PostgresParagonConfigSource(sql).loadSnapshot();
  }
  return new FileParagonConfigSource(serverConfig.catalogueFile).loadSnapshot();
}

async function main(): Promise<void> {
  log.info("Starting paragon server...", {
    host: serverConfig.host,
    port: serverConfig.port,
    path: serverConfig.path,
    database: serverConfig.useDatabase,
  });

  const catalogue = ParagonCatalogue.fromSnapshot(await loadSnapshot());
  const keyScope = serverConfig.keyScope ?? catalogue.settings.keyScope;

  const repo: ParagonRepository = serverConfig.useDatabase
    ? new PostgresParagonRepository(keyScope)
    : new InMemoryParagonRepository(keyScope);

  const channel = new SocketChannel();

  // Mediator: modules register here, then it is sealed for the process.
  const mediator = new Mediator();
  registerExperienceModifiers(mediator, catalogue.settings, {
    notify: (subjectId, text) => channel.send(subjectId, noticeMessage("info", text)),
  });
  mediator.seal();

  const bonuses = new InMemoryBonusApplicator();
  const engine = new ParagonEngine(catalogue, mediator, bonuses);
  const addon = new ParagonAddonHandler(catalogue, engine, channel);
  const sessions = new ParagonSessionService(engine, repo, addon);

  const server = http.createServer();
  const wss = new WebSocketServer({ server, path: serverConfig.path });

  wss.on("connection", (socket: WebSocket, req) => {
    const subject = parseSubject(req.url);
    if (!subject) {
      socket.close(4001, "bad_subject");
      return;
    }
    if (channel.has(subject.characterId)) {
      socket.close(4002, "already_connected");
      return;
    }

    const characterId = subject.characterId;
    channel.attach(characterId, socket);

    socket.on("message", (data) => {
      let raw: unknown;
      try {
        raw = decode(data);
      } catch (err) {
        log.warn("Dropping non-JSON message", { characterId, err });
        return;
      }

      const trigger = devTriggerSchema.safeParse(raw);
      if (trigger.success) {
        if (!serverConfig.devTriggers) {
          log.warn("Client trigger refused; dev triggers disabled", { characterId });
          return;
        }
        const result = routeTrigger(sessions, characterId, trigger.data.kind, trigger.data.entryId);
        log.debug("Dev trigger handled", { characterId, kind: trigger.data.kind, result });
        return;
      }

      if (!sessions.onAddonMessage(characterId, raw)) {
        log.debug("Addon message for subject not loaded", { characterId });
      }
    });

    socket.on("close", () => {
      channel.detach(characterId, socket);
      sessions.logout(characterId).catch((err) => {
        log.error("Paragon logout failed", { characterId, err });
      });
    });

    sessions
      .login(subject)
      .then(async () => {
        // socket closed while the state was loading
        if (!channel.has(characterId)) await sessions.logout(characterId);
      })
      .catch((err) => {
        log.error("Paragon login failed", { characterId, err });
        socket.close(1011, "load_failed");
      });
  });

  let autosave: NodeJS.Timeout | null = null;
  if (serverConfig.autosaveIntervalMs > 0) {
    autosave = setInterval(() => {
      sessions.saveAll().catch((err) => {
        log.error("Paragon autosave failed", { err });
      });
    }, serverConfig.autosaveIntervalMs);
  }

  const shutdown = (signal: string) => {
    log.info("Shutting down paragon server", { signal, active: sessions.count() });
    if (autosave) clearInterval(autosave);
    wss.close();
    server.close();
    sessions
      .saveAll()
      .then(async () => {
        if (serverConfig.useDatabase) {
          const { closeDb } = await import("../paragoncore/db/Database");
          await closeDb();
        }
        process.exit(0);
      })
      .catch((err) => {
        log.error("Final paragon save failed", { err });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  server.listen(serverConfig.port, serverConfig.host, () => {
    log.success("Paragon server listening", {
      host: serverConfig.host,
      port: serverConfig.port,
      path: serverConfig.path,
      keyScope,
      devTriggers: serverConfig.devTriggers,
    });
  });
}

// Entry point
main().catch((err: unknown) => {
  log.error("Fatal error in paragon server", { err });
  process.exit(1);
});
