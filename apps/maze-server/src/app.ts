import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { z, ZodError } from "zod";

import { GenerateCmd } from "@shared/core";
import { isMazeError, type MazeErrorCode } from "@sim/core";
import type { Config } from "./config";
import { UnknownMazeError, type MazeHub } from "./hub";
import type { Metrics } from "./metrics";

const STATUS: Record<MazeErrorCode, number> = {
  InvalidDimension: 400,
  NotAdjacent: 500,
  DisconnectedGraph: 500,
  SolveBeforeFinalized: 409,
  SolveInProgress: 409,
  GenerationCancelled: 409
};

const SolveBody = z.object({ stepwise: z.boolean().default(false) });

type Handler = (req: Request, res: Response) => Promise<unknown>;

// express 4 does not forward rejected handlers on its own
const route = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function generateBody(config: Config) {
  const dim = z.number().int().max(config.maxDimension, `at most ${config.maxDimension} cells per side`).optional();
  return GenerateCmd.omit({ kind: true }).extend({ width: dim, height: dim });
}

export function createApp(hub: MazeHub, metrics: Metrics, config: Config) {
  const app = express();
  app.use(cors());
  app.use(express.json());
  const GenerateBody = generateBody(config);

  app.get("/metrics", route(async (_req, res) => {
    res.set("Content-Type", metrics.registry.contentType);
    res.end(await metrics.registry.metrics());
  }));

  app.get("/healthz", (_req: Request, res: Response) => res.json({ ok: true }));

  app.post("/mazes", route(async (req, res) => {
    const body = GenerateBody.parse(req.body ?? {});
    const id = hub.create();
    try {
      const summary = await hub.generate(id, body);
      res.status(body.stepwise ? 202 : 201).json(summary);
    } catch (err) {
      hub.delete(id);
      throw err;
    }
  }));

  app.get("/mazes/:id", route(async (req, res) => {
    res.json(hub.summary(req.params.id ?? ""));
  }));

  // regenerate in place; an in-flight stepwise run in this slot is abandoned
  app.post("/mazes/:id/generate", route(async (req, res) => {
    const body = GenerateBody.parse(req.body ?? {});
    const summary = await hub.generate(req.params.id ?? "", body);
    res.status(body.stepwise ? 202 : 200).json(summary);
  }));

  app.post("/mazes/:id/solve", route(async (req, res) => {
    const { stepwise } = SolveBody.parse(req.body ?? {});
    const path = await hub.solve(req.params.id ?? "", { stepwise });
    res.json({ path, length: path.length - 1 });
  }));

  app.get("/mazes/:id/render", route(async (req, res) => {
    res.type("text/plain").send(hub.render(req.params.id ?? ""));
  }));

  app.delete("/mazes/:id", (req: Request, res: Response) => {
    if (!hub.delete(req.params.id ?? "")) return res.status(404).json({ error: "UnknownMaze" });
    return res.status(204).end();
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) return res.status(400).json({ error: "BadRequest", issues: err.issues });
    // malformed JSON from express.json()
    if (err instanceof SyntaxError) return res.status(400).json({ error: "BadRequest", message: err.message });
    if (err instanceof UnknownMazeError) return res.status(404).json({ error: "UnknownMaze", message: err.message });
    if (isMazeError(err)) {
      if (STATUS[err.code] >= 500) console.error(err);
      return res.status(STATUS[err.code]).json({ error: err.code, message: err.message });
    }
    console.error(err);
    return res.status(500).json({ error: "Internal" });
  });

  return app;
}
