import { z } from "zod";

// --- Cards ---

export const SUITS = ["Hearts", "Diamonds", "Clubs", "Spades"] as const;

export const RANKS = [
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "Jack",
  "Queen",
  "Ace",
] as const;

export const SuitSchema = z.enum(SUITS);
export const RankSchema = z.enum(RANKS);

export type Suit = z.infer<typeof SuitSchema>;
export type Rank = z.infer<typeof RankSchema>;

export const CardSchema = z.object({
  suit: SuitSchema,
  rank: RankSchema,
  value: z.number().int().min(2).max(14),
});

export type Card = z.infer<typeof CardSchema>;

// --- Seats & players ---

export const SeatIdSchema = z.enum(["P1", "P2"]);

export type SeatId = z.infer<typeof SeatIdSchema>;

export const TrickRoleSchema = z.enum(["leader", "follower"]);

export type TrickRole = z.infer<typeof TrickRoleSchema>;

export const ScoresSchema = z.object({
  P1: z.number().int().nonnegative(),
  P2: z.number().int().nonnegative(),
});

export type Scores = z.infer<typeof ScoresSchema>;

// --- Outcome ---

export const GameEndReasonSchema = z.enum(["round-limit", "early-termination"]);

export type GameEndReason = z.infer<typeof GameEndReasonSchema>;

export const GameOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("shoot-the-moon"),
    winner: SeatIdSchema,
    // Literal display score; the accumulated score tops out at the round cap
    displayScore: z.tuple([
      z.number().int().nonnegative(),
      z.number().int().nonnegative(),
    ]),
  }),
  z.object({
    kind: z.literal("win"),
    winner: SeatIdSchema,
  }),
  z.object({
    kind: z.literal("tie"),
  }),
]);

export type GameOutcome = z.infer<typeof GameOutcomeSchema>;

// --- Game events ---

export const DealEventSchema = z.object({
  type: z.literal("deal"),
  seat: SeatIdSchema,
  cards: z.array(CardSchema).nonempty(),
  dealNumber: z.number().int().nonnegative(),
});

export const LeadEventSchema = z.object({
  type: z.literal("lead"),
  round: z.number().int().positive(),
  seat: SeatIdSchema,
  card: CardSchema,
});

export const FollowEventSchema = z.object({
  type: z.literal("follow"),
  round: z.number().int().positive(),
  seat: SeatIdSchema,
  card: CardSchema,
  /** Whether the follower held the lead suit and so was bound to play it. */
  suitForced: z.boolean(),
});

export const TrickEventSchema = z.object({
  type: z.literal("trick"),
  round: z.number().int().positive(),
  winner: SeatIdSchema,
  role: TrickRoleSchema,
  scores: ScoresSchema,
});

export const RevealEventSchema = z.object({
  type: z.literal("reveal"),
  round: z.number().int().positive(),
  card: CardSchema.nullable(),
});

export const RedealEventSchema = z.object({
  type: z.literal("redeal"),
  round: z.number().int().positive(),
  dealNumber: z.number().int().positive(),
  cardsPerPlayer: z.number().int().positive(),
});

export const GameOverEventSchema = z.object({
  type: z.literal("game-over"),
  roundsPlayed: z.number().int().nonnegative(),
  reason: GameEndReasonSchema,
  scores: ScoresSchema,
  outcome: GameOutcomeSchema,
});

export const GameEventSchema = z.discriminatedUnion("type", [
  DealEventSchema,
  LeadEventSchema,
  FollowEventSchema,
  TrickEventSchema,
  RevealEventSchema,
  RedealEventSchema,
  GameOverEventSchema,
]);

export type TrickEvent = z.infer<typeof TrickEventSchema>;
export type GameOverEvent = z.infer<typeof GameOverEventSchema>;
export type GameEvent = z.infer<typeof GameEventSchema>;

// --- Rules data ---

export const RulesConfigSchema = z.object({
  rulesId: z.string().regex(/^[a-z0-9-]+$/),
  initialHandSize: z.number().int().positive(),
  redeal: z.object({
    /** Both hands must hold exactly this many cards to trigger a re-deal. */
    triggerHandSize: z.number().int().nonnegative(),
    cardsPerPlayer: z.number().int().positive(),
    maxRedeals: z.number().int().nonnegative(),
  }),
  maxRounds: z.number().int().positive(),
  earlyTermination: z.object({
    leaderThreshold: z.number().int().positive(),
    opponentMinimum: z.number().int().nonnegative(),
  }),
  shootTheMoon: z.object({
    tricks: z.number().int().positive(),
    displayScore: z.number().int().positive(),
  }),
});

export type RulesConfig = z.infer<typeof RulesConfigSchema>;

export const GameMetaSchema = z.object({
  rulesId: z.string(),
  gameName: z.string(),
});

export type GameMeta = z.infer<typeof GameMetaSchema>;
