/**
 * Round-by-round controller for one game.
 *
 * SETUP (names, shuffle, deal, first leader) → rounds until the round cap or
 * early termination → GAME_OVER summary. The controller is the only code that
 * mutates deck, hands and scores; rule helpers only read cards.
 */

import type {
  Card,
  GameEndReason,
  GameEvent,
  GameOverEvent,
  RulesConfig,
  SeatId,
} from "../../shared/schemas.js";
import { GameError } from "../../shared/errors.js";
import { Deck } from "./deck.js";
import { createGameLogger, type GameLogger } from "./engine-log.js";
import type { GameIO } from "./io/interface.js";
import { removeCard } from "./rules/cards.js";
import {
  SEATS,
  determineOutcome,
  getOtherSeat,
  isEarlyTermination,
} from "./rules/scoring.js";
import {
  isLegalFollow,
  legalFollowCards,
  legalLeadCards,
  resolveTrick,
} from "./rules/trick.js";
import { chooseCard } from "./selection.js";
import {
  appendEvent,
  assertInvariants,
  createGameState,
  normalizePlayerName,
  type GameState,
  type PlayerState,
} from "./state.js";
import { formatCard } from "./util/card-notation.js";
import { generateGameId, generateSeed } from "./util/game-id.js";
import {
  coinFlip,
  createSeededRandom,
  type RandomSource,
} from "./util/random.js";
import {
  formatFinalScoreLine,
  formatFollowPrompt,
  formatHand,
  formatNamePrompt,
  formatOutcome,
  formatRedeal,
  formatRevealed,
  formatScoreLine,
  formatWelcome,
} from "./view.js";

export interface GameOptions {
  rules: RulesConfig;
  /** Shown in the welcome banner. */
  gameName?: string;
  /** Normalised seed; a fresh one is generated when absent. */
  seed?: string | null;
  /** Overrides the seed-derived random source. */
  random?: RandomSource;
  /** Plays from this deck instead of shuffling a new one. */
  deck?: Deck;
  firstLeader?: SeatId;
  gameId?: string;
  /** Run structural checks after every round. Defaults to true. */
  checkInvariants?: boolean;
  debugLogging?: boolean;
}

export class GameController {
  private constructor(
    private readonly io: GameIO,
    readonly state: GameState,
    private readonly logger: GameLogger,
    private readonly checkInvariants: boolean
  ) {}

  static async setup(
    io: GameIO,
    options: GameOptions
  ): Promise<GameController> {
    io.print(formatWelcome(options.gameName ?? "Tricksy Battle"));
    io.print();

    const names: Record<SeatId, string> = {
      P1: normalizePlayerName(await io.ask(formatNamePrompt(1)), "P1"),
      P2: normalizePlayerName(await io.ask(formatNamePrompt(2)), "P2"),
    };

    const seed = options.seed ?? generateSeed();
    const random = options.random ?? createSeededRandom(seed);
    let deck = options.deck;
    if (!deck) {
      deck = Deck.shuffled(random);
      io.print(`Shuffling with seed: ${seed}`);
    }
    const firstLeader =
      options.firstLeader ?? coinFlip<SeatId>("P1", "P2", random);

    const gameId = options.gameId ?? generateGameId();
    const state = createGameState({
      gameId,
      seed,
      rules: options.rules,
      names,
      deck,
      firstLeader,
    });
    const logger = createGameLogger(
      gameId,
      names,
      options.debugLogging ?? false
    );
    logger.debug(`seed "${seed}", ${deck.size} cards in deck`);

    const controller = new GameController(
      io,
      state,
      logger,
      options.checkInvariants ?? true
    );
    controller.dealInitialHands();

    io.print();
    io.print(`${names[firstLeader]} will lead the first trick.`);
    io.print();
    return controller;
  }

  get names(): Record<SeatId, string> {
    return {
      P1: this.state.players.P1.name,
      P2: this.state.players.P2.name,
    };
  }

  /** Checked before each round, never mid-round. */
  get isOver(): boolean {
    const { round, scores, rules } = this.state;
    return (
      round >= rules.maxRounds ||
      isEarlyTermination(scores, rules.earlyTermination)
    );
  }

  async playRound(): Promise<void> {
    const { state, io, logger } = this;
    if (state.phase !== "in-progress" || this.isOver) {
      throw new GameError(
        "invariant",
        `Cannot play a round in phase "${state.phase}" after ${state.round} rounds`
      );
    }

    const round = state.round + 1;
    const leader = state.players[state.leader];
    const follower = state.players[state.follower];

    io.print(`--- Round ${round} ---`);
    io.print();

    // 1. Lead: any card in hand
    io.print(formatHand(leader));
    const leadCard = await chooseCard(
      io,
      leader.name,
      legalLeadCards(leader.hand),
      logger
    );
    this.takeFromHand(leader, leadCard);
    this.record({ type: "lead", round, seat: leader.seat, card: leadCard });
    io.print(`${leader.name} leads: ${formatCard(leadCard)}`);

    // 2. Follow: lead suit if held
    const { candidates, suitForced } = legalFollowCards(
      follower.hand,
      leadCard.suit
    );
    io.print(formatFollowPrompt(follower.name, leadCard.suit, suitForced));
    const followCard = await chooseCard(io, follower.name, candidates, logger);
    if (!isLegalFollow(follower.hand, leadCard.suit, followCard)) {
      throw new GameError(
        "selection",
        `${formatCard(followCard)} does not follow ${leadCard.suit}`
      );
    }
    this.takeFromHand(follower, followCard);
    this.record({
      type: "follow",
      round,
      seat: follower.seat,
      card: followCard,
      suitForced,
    });
    io.print(`${follower.name} plays: ${formatCard(followCard)}`);

    // 3. Resolve and score
    const role = resolveTrick(leadCard, followCard);
    const winner = role === "leader" ? leader : follower;
    state.scores[winner.seat] += 1;
    state.played.push(leadCard, followCard);
    this.record({
      type: "trick",
      round,
      winner: winner.seat,
      role,
      scores: { ...state.scores },
    });
    io.print(`${winner.name} wins the trick!`);
    io.print();

    // 4. Winner leads next
    state.leader = winner.seat;
    state.follower = getOtherSeat(winner.seat);

    // 5. Reveal, cosmetic only
    const revealed = state.deck.draw();
    if (revealed) {
      state.revealed.push(revealed);
      io.print(formatRevealed(revealed));
    }
    this.record({ type: "reveal", round, card: revealed });

    // 6. Top both hands back up
    this.redealIfDue(round);

    // 7. Round complete
    state.round = round;
    io.print(formatScoreLine(this.names, state.scores));
    io.print();

    this.verify();
  }

  finish(): GameOverEvent {
    const { state, io } = this;
    if (!this.isOver) {
      throw new GameError(
        "invariant",
        `Cannot finish after ${state.round} rounds with scores ${state.scores.P1}-${state.scores.P2}`
      );
    }

    const reason: GameEndReason =
      state.round >= state.rules.maxRounds
        ? "round-limit"
        : "early-termination";
    const event: GameOverEvent = {
      type: "game-over",
      roundsPlayed: state.round,
      reason,
      scores: { ...state.scores },
      outcome: determineOutcome(state.scores, state.rules.shootTheMoon),
    };
    state.phase = "over";
    this.record(event);

    io.print("=== GAME OVER ===");
    io.print(formatFinalScoreLine(this.names, state.scores));
    io.print(formatOutcome(this.names, event.outcome));
    return event;
  }

  private dealInitialHands(): void {
    for (const seat of SEATS) {
      this.dealTo(seat, this.state.rules.initialHandSize, 0);
    }
    this.state.phase = "in-progress";
    this.verify();
  }

  private redealIfDue(round: number): void {
    const { state, io } = this;
    const { triggerHandSize, cardsPerPlayer, maxRedeals } = state.rules.redeal;
    const bothAtTrigger = SEATS.every(
      (seat) => state.players[seat].hand.length === triggerHandSize
    );
    if (!bothAtTrigger || state.redealsDone >= maxRedeals) {
      return;
    }

    io.print();
    io.print(formatRedeal(cardsPerPlayer));
    io.print();

    const dealNumber = state.redealsDone + 1;
    this.record({ type: "redeal", round, dealNumber, cardsPerPlayer });
    for (const seat of SEATS) {
      this.dealTo(seat, cardsPerPlayer, dealNumber);
    }
    state.redealsDone = dealNumber;
  }

  private dealTo(seat: SeatId, count: number, dealNumber: number): void {
    const [first, ...rest] = this.state.deck.deal(count);
    if (!first) return;
    this.state.players[seat].hand.push(first, ...rest);
    this.record({ type: "deal", seat, cards: [first, ...rest], dealNumber });
  }

  private takeFromHand(player: PlayerState, card: Card): void {
    if (!removeCard(player.hand, card)) {
      throw new GameError(
        "selection",
        `${player.name} does not hold ${formatCard(card)}`
      );
    }
  }

  private record(event: GameEvent): void {
    appendEvent(this.state, event);
    this.logger.event(event);
  }

  private verify(): void {
    if (this.checkInvariants) {
      assertInvariants(this.state);
    }
  }
}

/**
 * Plays one complete game over `io` and returns the final state.
 */
export async function runGame(
  io: GameIO,
  options: GameOptions
): Promise<GameState> {
  const controller = await GameController.setup(io, options);
  while (!controller.isOver) {
    await controller.playRound();
  }
  controller.finish();
  return controller.state;
}
