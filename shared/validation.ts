/** Outcome of reading a player's typed card choice. */
export type SelectionResult =
  | {
      valid: true;
      /** Zero-based index into the candidate list. */
      index: number;
    }
  | { valid: false; reason: string };
