import { setTimeout as sleep } from "node:timers/promises";
import { v4 as uuidv4 } from "uuid";
import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";

import { prng, seedFromHex, type Coord, type GenerationState, type ServerMsg } from "@shared/core";
import { deriveSeed, hashLayout } from "@shared/seed";
import { MazeSession, countPassages, wallBytes, type Maze } from "@sim/core";
import { createMazeViewStore, renderText, type MazeViewStore } from "@view/core";
import type { Config } from "./config";
import type { Metrics } from "./metrics";

export type Subscriber = (msg: ServerMsg) => void;

export type GenerateParams = { width?: number; height?: number; stepwise?: boolean; seed?: string };

export type MazeSummary = {
  mazeId: string;
  seed?: string;
  state: GenerationState;
  width?: number;
  height?: number;
  passages?: number;
  layoutHash?: string;
};

type Slot = {
  id: string;
  session: MazeSession;
  view: MazeViewStore;
  subscribers: Set<Subscriber>;
  seed?: string;
  generations: number;
};

const tracer = trace.getTracer("maze-server");

/**
 * Runs `fn` inside an active span. A synchronous throw is recorded and rethrown as-is, so callers still see
 * command errors before any promise exists.
 */
function traced<T>(name: string, attrs: Record<string, string | number | boolean>, fn: (span: Span) => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, { attributes: attrs }, span => {
    const fail = (err: unknown): never => {
      span.recordException(err instanceof Error ? err : String(err));
      span.setStatus({ code: SpanStatusCode.ERROR });
      span.end();
      throw err;
    };
    let pending: Promise<T>;
    try {
      pending = fn(span);
    } catch (err) {
      return fail(err);
    }
    return pending.then(value => {
      span.end();
      return value;
    }, fail);
  });
}

/** Every maze the host knows about, each with its own session, view mirror and ws subscribers. */
export class MazeHub {
  private readonly slots = new Map<string, Slot>();

  constructor(private readonly config: Config, private readonly metrics: Metrics) {}

  create(): string {
    const id = uuidv4();
    const view = createMazeViewStore();
    const subscribers = new Set<Subscriber>();
    const session = new MazeSession({
      boundary: () => sleep(this.config.stepDelayMs),
      emit: event => {
        view.getState().apply(event);
        for (const send of subscribers) send({ kind: "EVENT", mazeId: id, event });
      }
    });
    this.slots.set(id, { id, session, view, subscribers, generations: 0 });
    return id;
  }

  has(id: string) {
    return this.slots.has(id);
  }

  /** Drops a maze. An in-flight stepwise run stops at its next step boundary. */
  delete(id: string) {
    const slot = this.slots.get(id);
    if (!slot) return false;
    slot.session.discard();
    slot.subscribers.clear();
    return this.slots.delete(id);
  }

  subscribe(id: string, fn: Subscriber): () => void {
    const slot = this.slot(id);
    slot.subscribers.add(fn);
    return () => {
      slot.subscribers.delete(fn);
    };
  }

  /**
   * Starts a generation in the slot. Immediate runs resolve once Finalized; stepwise runs resolve as soon
   * as they have started and keep streaming events. Dimension errors throw before anything is replaced.
   */
  generate(id: string, params: GenerateParams): Promise<MazeSummary> {
    const slot = this.slot(id);
    const width = params.width ?? this.config.defaultWidth;
    const height = params.height ?? this.config.defaultHeight;
    const stepwise = params.stepwise ?? false;
    const seed = params.seed ?? deriveSeed(this.config.seedSalt, `${id}#${slot.generations}`, width, height);
    const mode = stepwise ? "stepwise" : "immediate";

    const startedAt = performance.now();
    const finished = traced("maze.generate", { "maze.id": id, "maze.width": width, "maze.height": height, "maze.mode": mode }, span => {
      const run = slot.session.generate({ width, height, stepwise, rnd: prng(seedFromHex(seed)) });
      slot.generations++;
      slot.seed = seed;
      return run.then(maze => {
        if (!maze) {
          span.setAttribute("maze.abandoned", true);
          return;
        }
        this.metrics.generationDuration.observe(performance.now() - startedAt);
        this.metrics.mazesGenerated.inc({ mode });
        console.log(`maze ${id} finalized ${width}x${height} (${mode})`);
      });
    });

    if (stepwise) {
      finished.catch((err: unknown) => console.error(`maze ${id} generation failed`, err));
      return Promise.resolve(this.summary(id));
    }
    return finished.then(() => this.summary(id));
  }

  solve(id: string, opts: { stepwise?: boolean } = {}): Promise<Coord[]> {
    const slot = this.slot(id);
    return traced("maze.solve", { "maze.id": id, "maze.stepwise": opts.stepwise ?? false }, () =>
      slot.session.solve(opts).then(path => {
        this.metrics.solves.inc();
        this.metrics.solutionLength.observe(path.length);
        return path;
      })
    );
  }

  summary(id: string): MazeSummary {
    const slot = this.slot(id);
    const maze: Maze | undefined = slot.session.maze;
    const view = slot.view.getState();
    const base: MazeSummary = { mazeId: id, seed: slot.seed, state: slot.session.state };
    if (!maze) return view.width > 0 ? { ...base, width: view.width, height: view.height } : base;
    return {
      ...base,
      width: maze.w,
      height: maze.h,
      passages: countPassages(maze),
      layoutHash: hashLayout(wallBytes(maze))
    };
  }

  render(id: string): string {
    return renderText(this.slot(id).view.getState());
  }

  private slot(id: string): Slot {
    const slot = this.slots.get(id);
    if (!slot) throw new UnknownMazeError(id);
    return slot;
  }
}

export class UnknownMazeError extends Error {
  constructor(readonly mazeId: string) {
    super(`no maze with id ${mazeId}`);
    this.name = "UnknownMazeError";
  }
}
