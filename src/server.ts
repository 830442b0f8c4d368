import cors from "cors";
import express, { type Request, type Response } from "express";
import { describeZodError, diagnoseRequestSchema } from "./contracts.js";
import type { DiagnosticPipeline, PipelineEvent } from "./pipeline/orchestrator.js";
import type { InMemorySessionStore, SessionStore } from "./pipeline/session-store.js";
import { encodeSseEvent, SSE_HEADERS } from "./pipeline/sse.js";
import { PipelineError } from "./pipeline/stage-result.js";
import { logEvent, toErrorMessage } from "./telemetry.js";

export type PipelineFactoryOptions = {
  store: SessionStore;
  onEvent?: (event: PipelineEvent) => void;
};

export type ServerDeps = {
  store: InMemorySessionStore;
  createPipeline: (options: PipelineFactoryOptions) => DiagnosticPipeline;
};

function errorBody(error: unknown) {
  if (error instanceof PipelineError) {
    return { status: 502, body: { error: error.message, stage: error.stage } };
  }
  return { status: 500, body: { error: toErrorMessage(error) } };
}

export function createApp(deps: ServerDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: "256kb" }));
  app.use(cors());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/api/diagnose", async (req: Request, res: Response) => {
    const parsed = diagnoseRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeZodError(parsed.error), details: parsed.error.flatten() });
      return;
    }

    try {
      const report = await deps.createPipeline({ store: deps.store }).run(parsed.data);
      res.json(report);
    } catch (error) {
      const { status, body } = errorBody(error);
      logEvent("error", "http.diagnose_failed", { status, message: toErrorMessage(error) });
      res.status(status).json(body);
    }
  });

  app.post("/api/diagnose/stream", async (req: Request, res: Response) => {
    const parsed = diagnoseRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeZodError(parsed.error), details: parsed.error.flatten() });
      return;
    }

    let closed = false;
    res.on("close", () => {
      closed = true;
    });
    const send = (event: string, data: unknown) => {
      if (!closed) res.write(encodeSseEvent(event, data));
    };

    res.writeHead(200, SSE_HEADERS);
    const pipeline = deps.createPipeline({
      store: deps.store,
      onEvent: (event) => send(event.type, event),
    });

    try {
      send("report", await pipeline.run(parsed.data));
    } catch (error) {
      const { body } = errorBody(error);
      logEvent("error", "http.diagnose_stream_failed", { message: toErrorMessage(error) });
      send("error", body);
    } finally {
      res.end();
    }
  });

  app.get("/api/sessions/:sessionId", (req: Request, res: Response) => {
    const sessionId = req.params.sessionId;
    const record = deps.store.get(sessionId);
    if (!record) {
      res.status(404).json({ error: `unknown session: ${sessionId}` });
      return;
    }
    res.json({
      sessionId: record.sessionId,
      createdAt: record.createdAt,
      history: record.history,
      symptomEvolution: deps.store.symptomEvolution(sessionId),
      searchHistory: deps.store.searchHistory(sessionId),
    });
  });

  return app;
}
