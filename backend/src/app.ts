import { promises as fs } from "node:fs";
import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { z } from "zod";
import { AppError, DocumentError, DocumentValidationError, NoDocumentError, SessionNotFoundError, UsageLimitError } from "./errors.js";
import { getLogger } from "./logger.js";
import { FixGenerator } from "./services/aiService.js";
import { DocxDocument } from "./services/documentModel.js";
import { hasSupportedExtension, validateDocx } from "./services/documentValidation.js";
import { buildStoredPath, cleanOutputName, removeArtifact } from "./services/fileStorage.js";
import { applyAllFixes, readDocumentText, replaceText } from "./services/fixApplier.js";
import { previewFix } from "./services/fixPreview.js";
import { formatOccurrenceContext, locateOccurrences } from "./services/occurrenceLocator.js";
import { SessionStore } from "./sessionStore.js";
import { Fix, Occurrence, SessionState } from "./types.js";
import { UsageLimiter } from "./usageLimiter.js";
import { UserTaskQueue } from "./userTaskQueue.js";

const log = getLogger("api");

export type AppDependencies = {
  sessions: SessionStore;
  usage: UsageLimiter;
  queue?: UserTaskQueue;
  fixGenerator?: FixGenerator;
  storageDir: string;
  maxFileSizeBytes: number;
};

const MAX_CONTEXTS_SHOWN = 10;

const createSessionSchema = z.object({
  mode: z.enum(["edit", "analyze", "fix"]),
  channel: z.string().min(1).max(200).optional()
});

const findSchema = z.object({
  search: z.string().min(1).max(1000)
});

const replaceSchema = z.object({
  search: z.string().min(1).max(1000),
  replace: z.string().max(1000)
});

const fixSchema = z.object({
  search: z.string().max(1000),
  replace: z.string().max(1000)
});

const setFixesSchema = z.object({
  fixes: z.array(fixSchema).max(200)
});

const applyFixesSchema = z.object({
  indices: z.array(z.number().int().min(0)).max(200).optional()
});

function readRouteParam(value: string | string[] | undefined): string {
  if (!value) {
    return "";
  }
  if (Array.isArray(value)) {
    return value[0] || "";
  }
  return value;
}

function toOccurrenceWire(occurrence: Occurrence): { index: number; sentence: string; container_index: number } {
  return {
    index: occurrence.index,
    sentence: occurrence.sentence,
    container_index: occurrence.containerIndex
  };
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      error: "Invalid request body.",
      issues: error.issues
    });
    return;
  }
  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error(error.message, { error });
    } else {
      log.warn(error.message);
    }
    res.status(error.status).json({
      error: error.userMessage,
      ...(error instanceof UsageLimitError ? { nextExpiry: error.nextExpiry } : {})
    });
    return;
  }
  log.error(fallback, { error });
  res.status(500).json({ error: fallback });
}

function summarizeSession(session: SessionState, sessions: SessionStore) {
  return {
    userId: session.userId,
    mode: session.mode,
    hasFile: !!session.filePath,
    originalName: session.originalName ?? null,
    pendingFixes: session.pendingFixes,
    findText: session.findText ?? null,
    warningSent: session.warningSent,
    timeoutRemaining: sessions.timeoutRemaining(session.userId)
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const { sessions, usage } = deps;
  const queue = deps.queue || new UserTaskQueue();
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxFileSizeBytes }
  });

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  function requireSession(userId: string): SessionState {
    const session = sessions.get(userId);
    if (!session) {
      throw new SessionNotFoundError(userId);
    }
    return session;
  }

  function requireFile(userId: string): { session: SessionState; filePath: string } {
    const session = requireSession(userId);
    if (!session.filePath) {
      throw new NoDocumentError(userId);
    }
    return { session, filePath: session.filePath };
  }

  /** Hands a new artifact to the session; if the session is gone the artifact is deleted. */
  async function adoptArtifact(userId: string, artifactPath: string, originalName?: string): Promise<void> {
    const adopted = originalName
      ? await sessions.setFile(userId, artifactPath, originalName)
      : await sessions.updateFile(userId, artifactPath);
    if (!adopted) {
      await removeArtifact(artifactPath);
      throw new SessionNotFoundError(userId);
    }
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString(), sessions: sessions.size });
  });

  app.post("/api/users/:userId/session", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const payload = createSessionSchema.parse(req.body);
      const session = await queue.run(userId, () => sessions.create(userId, payload.mode, payload.channel));
      res.status(201).json(summarizeSession(session, sessions));
    } catch (error) {
      sendError(res, error, "Failed to start session.");
    }
  });

  app.get("/api/users/:userId/session", (req, res) => {
    try {
      const session = requireSession(readRouteParam(req.params.userId));
      res.json(summarizeSession(session, sessions));
    } catch (error) {
      sendError(res, error, "Failed to read session.");
    }
  });

  app.post("/api/users/:userId/session/keep-alive", (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      requireSession(userId);
      sessions.updateActivity(userId);
      res.json({ timeoutRemaining: sessions.timeoutRemaining(userId) });
    } catch (error) {
      sendError(res, error, "Failed to refresh session.");
    }
  });

  app.delete("/api/users/:userId/session", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      await queue.run(userId, () => sessions.cleanup(userId));
      res.status(204).send();
    } catch (error) {
      sendError(res, error, "Failed to cancel session.");
    }
  });

  app.post("/api/users/:userId/document", upload.single("file"), async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      requireSession(userId);
      const file = req.file;
      if (!file) {
        throw new DocumentValidationError("No file uploaded.");
      }
      if (!hasSupportedExtension(file.originalname)) {
        throw new DocumentValidationError("Invalid file type. Supported: .docx");
      }

      const storedPath = buildStoredPath(deps.storageDir, file.originalname);
      await fs.writeFile(storedPath, file.buffer);
      const validation = await validateDocx(storedPath, deps.maxFileSizeBytes);
      if (!validation.valid) {
        await removeArtifact(storedPath);
        throw new DocumentValidationError(validation.reason);
      }

      await queue.run(userId, () => adoptArtifact(userId, storedPath, file.originalname));
      res.status(201).json({
        originalName: file.originalname,
        timeoutRemaining: sessions.timeoutRemaining(userId)
      });
    } catch (error) {
      sendError(res, error, "Failed to receive document.");
    }
  });

  app.get("/api/users/:userId/document", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const { session, filePath } = requireFile(userId);
      const buffer = await fs.readFile(filePath);
      res.attachment(cleanOutputName(session.originalName || "document.docx"));
      res.type("application/vnd.openxmlformats-officedocument.wordprocessingml.document");
      res.send(buffer);
      await queue.run(userId, () => sessions.cleanup(userId));
    } catch (error) {
      sendError(res, error, "Failed to send document.");
    }
  });

  app.post("/api/users/:userId/occurrences", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const payload = findSchema.parse(req.body);
      const { filePath } = requireFile(userId);
      const occurrences = locateOccurrences(await DocxDocument.open(filePath), payload.search);
      if (occurrences.length === 0) {
        sessions.updateActivity(userId);
        res.json({ found: false, count: 0, occurrences: [], contexts: [] });
        return;
      }

      sessions.update(userId, { findText: payload.search, occurrences });
      res.json({
        found: true,
        count: occurrences.length,
        occurrences: occurrences.map(toOccurrenceWire),
        contexts: occurrences
          .slice(0, MAX_CONTEXTS_SHOWN)
          .map((occurrence) => formatOccurrenceContext(occurrence.sentence, payload.search))
      });
    } catch (error) {
      sendError(res, error, "Failed to search document.");
    }
  });

  app.post("/api/users/:userId/replace", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const payload = replaceSchema.parse(req.body);
      requireFile(userId);

      const result = await queue.run(userId, async () => {
        const { filePath } = requireFile(userId);
        const outcome = await replaceText(filePath, payload.search, payload.replace);
        if (outcome.artifactPath) {
          await adoptArtifact(userId, outcome.artifactPath);
        }
        sessions.update(userId, { findText: payload.search, replaceText: payload.replace, occurrences: [] });
        return outcome;
      });

      if (result.status === "failed") {
        throw new DocumentError(result.error || "Replacement failed.", "Could not edit the document. Please try again.");
      }
      res.json({ status: result.status, replacements: result.replacements });
    } catch (error) {
      sendError(res, error, "Failed to replace text.");
    }
  });

  app.put("/api/users/:userId/fixes", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const payload = setFixesSchema.parse(req.body);
      const { filePath } = requireFile(userId);
      const fixes: Fix[] = payload.fixes.map((fix) => ({ search: fix.search, replace: fix.replace }));

      const document = await DocxDocument.open(filePath);
      sessions.update(userId, { pendingFixes: fixes, appliedFixes: [], skippedFixes: [] });
      res.json({
        count: fixes.length,
        previews: fixes.map((fix) => {
          const preview = previewFix(document, fix);
          return { ...preview, occurrences: preview.occurrences.slice(0, MAX_CONTEXTS_SHOWN) };
        })
      });
    } catch (error) {
      sendError(res, error, "Failed to store fixes.");
    }
  });

  app.post("/api/users/:userId/fixes/generate", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      requireFile(userId);
      const generator = deps.fixGenerator;
      if (!generator) {
        throw new AppError("No fix generator configured.", {
          userMessage: "Automatic analysis is not available.",
          status: 503
        });
      }

      // one analysis per user at a time, so the limit check and the record cannot interleave
      const generated = await queue.run(userId, async () => {
        const { filePath } = requireFile(userId);
        const check = usage.canUse(userId);
        if (!check.allowed) {
          throw new UsageLimitError(userId, usage.nextExpiry(userId));
        }

        const text = await readDocumentText(filePath);
        if (!text) {
          throw new DocumentError("Document has no readable text.", "Failed to read document content.");
        }

        const fixes = await generator.generateFixes(text);
        const remaining = usage.recordUse(userId);
        sessions.update(userId, { pendingFixes: fixes, appliedFixes: [], skippedFixes: [] });
        return { fixes, remaining };
      });

      res.json({
        fixes: generated.fixes,
        remaining: generated.remaining,
        usageStatus: usage.canUse(userId).status
      });
    } catch (error) {
      sendError(res, error, "Failed to generate fixes.");
    }
  });

  app.post("/api/users/:userId/fixes/apply", async (req, res) => {
    try {
      const userId = readRouteParam(req.params.userId);
      const payload = applyFixesSchema.parse(req.body ?? {});
      requireFile(userId);

      const outcome = await queue.run(userId, async () => {
        const { session, filePath } = requireFile(userId);
        const pending = session.pendingFixes;
        const selected = payload.indices ? new Set(payload.indices) : null;
        const accepted = selected ? pending.filter((_fix, index) => selected.has(index)) : pending;
        const rejected = selected ? pending.filter((_fix, index) => !selected.has(index)) : [];

        const result = await applyAllFixes(filePath, accepted);
        if (result.status === "failed") {
          return { result, rejected };
        }
        if (result.artifactPath) {
          await adoptArtifact(userId, result.artifactPath);
        }
        sessions.update(userId, {
          pendingFixes: [],
          appliedFixes: result.applied,
          skippedFixes: [...result.skipped, ...rejected]
        });
        return { result, rejected };
      });

      if (outcome.result.status === "failed") {
        throw new DocumentError(outcome.result.error || "Applying fixes failed.", "Could not apply fixes. Please try again.");
      }
      const { result, rejected } = outcome;
      res.json({
        status: result.status,
        appliedCount: result.appliedCount,
        skippedCount: result.skippedCount,
        applied: result.applied,
        skipped: result.skipped,
        rejected,
        outcomes: result.outcomes
      });
    } catch (error) {
      sendError(res, error, "Failed to apply fixes.");
    }
  });

  app.get("/api/users/:userId/usage", (req, res) => {
    const userId = readRouteParam(req.params.userId);
    const { used, limit } = usage.usage(userId);
    res.json({
      used,
      limit,
      remaining: Math.max(0, limit - used),
      nextExpiry: usage.nextExpiry(userId)
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const message =
        error.code === "LIMIT_FILE_SIZE"
          ? `File too large. Maximum size: ${deps.maxFileSizeBytes / (1024 * 1024)}MB`
          : error.message;
      res.status(400).json({ error: message });
      return;
    }
    sendError(res, error, "Unexpected server error.");
  });

  return app;
}
