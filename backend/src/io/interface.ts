/**
 * The terminal boundary the game loop talks to.
 *
 * The loop awaits one `ask` at a time; implementations never see two
 * questions outstanding.
 */
export interface GameIO {
  /** Writes one line of output. An omitted line prints a blank one. */
  print(line?: string): void;

  /**
   * Shows `question` and resolves with the next line of input, without its
   * line ending. Rejects with an `input-closed` GameError once input has ended.
   */
  ask(question: string): Promise<string>;

  /** Releases the underlying streams. Safe to call more than once. */
  close(): void;
}
