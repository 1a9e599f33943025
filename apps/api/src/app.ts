import Fastify, { type FastifyError } from "fastify";
import cors from "@fastify/cors";
import type { CloudFileEntry, DownloadLink, StorageTarget, UploadOutcome } from "@pan115-bridge/shared";
import { z } from "zod";
import { Pan115Error } from "./core/errors.js";
import type { FileEntry } from "./core/types.js";
import type { Logger } from "./lib/logger.js";
import { BufferContentSource } from "./modules/cloud115/content-source.js";
import { parseCookie } from "./modules/cloud115/credential.js";
import type { Pan115Session } from "./modules/cloud115/session.js";
import type { Cloud115Adapter } from "./modules/storage/adapters/cloud-115-adapter.js";

export interface AppDeps {
  session: Pan115Session;
  adapter: Cloud115Adapter;
  logger: Logger;
  rootDirId?: string;
}

const listQuerySchema = z.object({
  dirId: z.string().min(1).default("0"),
  pageSize: z.coerce.number().int().optional()
});

const downloadParamsSchema = z.object({
  pickCode: z.string().min(1)
});

const credentialBodySchema = z.object({
  cookie: z.string().min(1)
});

const uploadBodySchema = z.object({
  dirId: z.string().min(1),
  fileName: z.string().min(1),
  contentBase64: z.string()
});

function toCloudFileEntry(entry: FileEntry): CloudFileEntry {
  return { ...entry, modifiedAt: entry.modifiedAt.toISOString() };
}

export async function buildApp(deps: AppDeps) {
  const { session, adapter } = deps;
  const app = Fastify({ loggerInstance: deps.logger });
  await app.register(cors, { origin: true });

  app.setErrorHandler<FastifyError>((error, _req, reply) => {
    if (error instanceof z.ZodError) {
      return reply.code(400).send({
        message: "Invalid request payload",
        issues: error.issues
      });
    }
    if (error instanceof Pan115Error) {
      return reply.code(error.statusCode).send({ message: error.message, code: error.code });
    }

    const statusCode =
      typeof error.statusCode === "number" && error.statusCode >= 400 ? error.statusCode : 500;
    return reply.code(statusCode).send({ message: error.message || "Internal server error" });
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.get("/api/storages", async (): Promise<{ items: StorageTarget[] }> => ({
    items: [{ id: "cloud115", name: "115", type: "cloud_115", rootDirId: deps.rootDirId ?? "0" }]
  }));

  app.post("/api/cloud115/login", async () => {
    await adapter.login();
    return { userId: session.userId };
  });

  app.put("/api/cloud115/credential", async (req, reply) => {
    const { cookie } = credentialBodySchema.parse(req.body);
    session.setCredential(parseCookie(cookie));
    return reply.code(204).send();
  });

  app.get("/api/cloud115/files", async (req) => {
    const query = listQuerySchema.parse(req.query);
    await adapter.ensureLoggedIn();
    const entries =
      query.pageSize === undefined ? await adapter.listFiles(query.dirId) : await session.listFiles(query.dirId, query.pageSize);
    return { items: entries.map(toCloudFileEntry) };
  });

  app.get("/api/cloud115/download/:pickCode", async (req): Promise<DownloadLink> => {
    const { pickCode } = downloadParamsSchema.parse(req.params);
    const descriptor = await adapter.getDownloadLink(pickCode, req.headers["user-agent"]);
    return {
      fileName: descriptor.fileName,
      fileSize: descriptor.fileSize,
      pickCode: descriptor.pickCode,
      url: descriptor.url,
      headers: Object.fromEntries(descriptor.headers.entries())
    };
  });

  app.post("/api/cloud115/upload", async (req): Promise<UploadOutcome> => {
    const body = uploadBodySchema.parse(req.body);
    const content = new BufferContentSource(Buffer.from(body.contentBase64, "base64"));
    const stored = await adapter.writeFile(body.dirId, body.fileName, content);
    return { kind: stored.rapid ? "accepted" : "uploaded", pickCode: stored.pickCode, sha1: stored.sha1 };
  });

  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ message: "Not found" }));

  app.addHook("onClose", async () => {
    await session.client.close();
  });

  return app;
}
