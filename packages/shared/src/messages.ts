import { z } from "zod";

/** Core vocabulary shared by the generator, the solver and every presentation layer. */
export const Direction = z.enum(["RIGHT", "LEFT", "TOP", "BOTTOM"]);
export type Direction = z.infer<typeof Direction>;

export const CellTag = z.enum(["Untouched", "Current", "Completed", "StartOfMaze", "EndOfMaze", "Solution"]);
export type CellTag = z.infer<typeof CellTag>;

export const GenerationState = z.enum(["NotStarted", "InProgress", "Finalized"]);
export type GenerationState = z.infer<typeof GenerationState>;

export const Coord = z.object({ x: z.number().int().nonnegative(), y: z.number().int().nonnegative() });
export type Coord = z.infer<typeof Coord>;

/** Core -> presentation events. */
export const CellEvent = z.object({
  kind: z.literal("cell"),
  x: z.number().int(),
  y: z.number().int(),
  tag: CellTag
});
export type CellEvent = z.infer<typeof CellEvent>;

export const WallEvent = z.object({
  kind: z.literal("wall"),
  x: z.number().int(),
  y: z.number().int(),
  dir: Direction
});
export type WallEvent = z.infer<typeof WallEvent>;

export const PhaseEvent = z.object({
  kind: z.literal("phase"),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  state: GenerationState
});
export type PhaseEvent = z.infer<typeof PhaseEvent>;

export const SolvedEvent = z.object({
  kind: z.literal("solved"),
  path: z.array(Coord)
});
export type SolvedEvent = z.infer<typeof SolvedEvent>;

export const MazeEvent = z.discriminatedUnion("kind", [CellEvent, WallEvent, PhaseEvent, SolvedEvent]);
export type MazeEvent = z.infer<typeof MazeEvent>;

/** Host wire-level contracts. */
export const GenerateCmd = z.object({
  kind: z.literal("GENERATE"),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
  stepwise: z.boolean().default(false),
  seed: z.string().regex(/^[0-9a-f]{8,}$/i).optional()
});
export type GenerateCmd = z.infer<typeof GenerateCmd>;

export const SolveCmd = z.object({ kind: z.literal("SOLVE"), stepwise: z.boolean().default(false) });
export type SolveCmd = z.infer<typeof SolveCmd>;

export const ClientMsg = z.discriminatedUnion("kind", [GenerateCmd, SolveCmd]);
export type ClientMsg = z.infer<typeof ClientMsg>;

export const ReadyMsg = z.object({ kind: z.literal("READY"), mazeId: z.string() });
export type ReadyMsg = z.infer<typeof ReadyMsg>;

export const EventMsg = z.object({ kind: z.literal("EVENT"), mazeId: z.string(), event: MazeEvent });
export type EventMsg = z.infer<typeof EventMsg>;

export const ErrorMsg = z.object({ kind: z.literal("ERROR"), code: z.string(), message: z.string() });
export type ErrorMsg = z.infer<typeof ErrorMsg>;

export const ServerMsg = z.discriminatedUnion("kind", [ReadyMsg, EventMsg, ErrorMsg]);
export type ServerMsg = z.infer<typeof ServerMsg>;
