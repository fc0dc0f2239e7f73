import { z } from "zod";

const Env = z.object({
  SERVER_PORT: z.coerce.number().int().nonnegative().default(8080),
  MAZE_DEFAULT_WIDTH: z.coerce.number().int().positive().default(10),
  MAZE_DEFAULT_HEIGHT: z.coerce.number().int().positive().default(10),
  MAZE_MAX_DIMENSION: z.coerce.number().int().positive().default(100),
  STEP_DELAY_MS: z.coerce.number().nonnegative().default(25),
  MAZE_SEED_SALT: z.string().min(1).default("salt")
});

export type Config = {
  port: number;
  defaultWidth: number;
  defaultHeight: number;
  maxDimension: number;
  stepDelayMs: number;
  seedSalt: string;
};

/** Reads host settings from the environment; throws a ZodError naming every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const e = Env.parse(env);
  return {
    port: e.SERVER_PORT,
    defaultWidth: e.MAZE_DEFAULT_WIDTH,
    defaultHeight: e.MAZE_DEFAULT_HEIGHT,
    maxDimension: e.MAZE_MAX_DIMENSION,
    stepDelayMs: e.STEP_DELAY_MS,
    seedSalt: e.MAZE_SEED_SALT
  };
}
