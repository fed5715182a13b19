import { z } from "zod";
import { Config } from "./config";
import { Events } from "./events";

export * from "./events";
export { Config } from "./config";

// --- Schemas (Question Bank) ---

export const QuestionDifficultySchema = z.enum(["easy", "medium", "hard"]);

export const QuestionPromptSchema = z.object({
  text: z.string().min(1),
  choices: z.array(z.string()).optional(),
  category: z.string().optional(),
  difficulty: QuestionDifficultySchema.optional(),
});

export const QuestionSchema = z.object({
  id: z.string().min(1),
  prompt: QuestionPromptSchema,
  correctAnswer: z.string(),
  weight: z.number().int().positive().default(Config.question.defaultWeight),
  timeLimitTicks: z.number().int().positive().default(Config.question.defaultTimeLimitTicks),
});

export const QuestionPoolSchema = z
  .array(QuestionSchema)
  .min(1)
  .superRefine((questions, ctx) => {
    const seen = new Set<string>();
    questions.forEach((q, index) => {
      if (seen.has(q.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate question id "${q.id}"`,
          path: [index, "id"],
        });
      }
      seen.add(q.id);
    });
  });

// --- Schemas (Game Configuration) ---

export const GameConfigSchema = z
  .object({
    minPlayers: z.number().int().min(1).default(Config.game.minPlayers),
    maxPlayers: z.number().int().min(1).default(Config.game.maxPlayers),
    totalRounds: z.number().int().min(1).default(Config.game.totalRounds),
    eliminateAfterMissedRounds: z.number().int().min(0).default(Config.game.eliminateAfterMissedRounds),
    payoutByRank: z.array(z.number().int().nonnegative()).default(() => [...Config.game.payoutByRank]),
  })
  .refine((config) => config.minPlayers <= config.maxPlayers, {
    message: "minPlayers must not exceed maxPlayers",
    path: ["minPlayers"],
  });

export const GameInputSchema = z.object({
  gameId: z.string().min(1).optional(),
  seed: z.string().min(1),
  config: GameConfigSchema.default({}),
});

// --- Schemas (Inbound Event Envelopes) ---

// Safe integers only: past 2^53 adding a time limit no longer moves the deadline
const TickSchema = z.number().int().nonnegative().safe();
const PlayerIdSchema = z.string().min(1);

export const PlayerJoinEventSchema = z.object({
  type: z.literal(Events.Player.JOIN),
  tick: TickSchema,
  playerId: PlayerIdSchema,
});

export const StartGameEventSchema = z.object({
  type: z.literal(Events.Game.START),
  tick: TickSchema,
});

export const SubmitAnswerEventSchema = z.object({
  type: z.literal(Events.Answer.SUBMIT),
  tick: TickSchema,
  playerId: PlayerIdSchema,
  answer: z.string().max(Config.question.maxAnswerLength),
  // Round the answer was meant for; a stale answer is rejected instead of landing in a later round
  roundNumber: z.number().int().positive().optional(),
});

export const TickEventSchema = z.object({
  type: z.literal(Events.System.TICK),
  tick: TickSchema,
});

export const ForceEndEventSchema = z.object({
  type: z.literal(Events.Admin.FORCE_END),
  tick: TickSchema,
  reason: z.string().optional(),
});

export const GameEventSchema = z.discriminatedUnion("type", [
  PlayerJoinEventSchema,
  StartGameEventSchema,
  SubmitAnswerEventSchema,
  TickEventSchema,
  ForceEndEventSchema,
]);

// --- Types (Inferred) ---

export type QuestionDifficulty = z.infer<typeof QuestionDifficultySchema>;
export type QuestionPrompt = z.infer<typeof QuestionPromptSchema>;
export type Question = z.infer<typeof QuestionSchema>;
export type QuestionInput = z.input<typeof QuestionSchema>;
export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;
export type GameInput = z.input<typeof GameInputSchema>;
export type ResolvedGameInput = z.infer<typeof GameInputSchema>;
export type GameEvent = z.infer<typeof GameEventSchema>;
export type PlayerJoinEvent = z.infer<typeof PlayerJoinEventSchema>;
export type StartGameEvent = z.infer<typeof StartGameEventSchema>;
export type SubmitAnswerEvent = z.infer<typeof SubmitAnswerEventSchema>;
export type TickEvent = z.infer<typeof TickEventSchema>;
export type ForceEndEvent = z.infer<typeof ForceEndEventSchema>;
