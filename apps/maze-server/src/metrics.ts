import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";

export type Metrics = ReturnType<typeof createMetrics>;

export function createMetrics(opts: { defaults?: boolean } = {}) {
  const registry = new Registry();
  if (opts.defaults) collectDefaultMetrics({ register: registry });
  return {
    registry,
    mazesGenerated: new Counter({ name: "mazes_generated_total", help: "Mazes carved to completion", labelNames: ["mode"], registers: [registry] }),
    solves: new Counter({ name: "maze_solves_total", help: "Solve commands served", registers: [registry] }),
    generationDuration: new Histogram({ name: "maze_generation_duration_ms", help: "Milliseconds from generate to Finalized", buckets: [1, 5, 25, 100, 500, 2500, 10000, 60000], registers: [registry] }),
    solutionLength: new Histogram({ name: "maze_solution_length", help: "Cells on the solution path", buckets: [2, 5, 10, 25, 50, 100, 250, 500], registers: [registry] }),
    wsConnections: new Counter({ name: "ws_connections_total", help: "WS connections", registers: [registry] })
  };
}
