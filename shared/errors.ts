export type GameErrorType =
  | "deck-exhausted"
  | "invariant"
  | "selection"
  | "input-closed"
  | "config";

export class GameError extends Error {
  type: GameErrorType;
  details?: string;

  constructor(type: GameErrorType, message: string, details?: string) {
    super(message);
    this.name = "GameError";
    this.type = type;
    this.details = details;
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
