import { randomBytes } from "node:crypto";

// No 0/o, 1/l/i: ids and seeds get read aloud and retyped
const ALPHABET = "23456789abcdefghjkmnpqrstuvwxyz";
const GAME_ID_LENGTH = 8;
const SEED_LENGTH = 6;

function randomToken(length: number): string {
  const bytes = randomBytes(length);
  let token = "";
  for (let i = 0; i < length; i++) {
    token += ALPHABET[bytes[i] % ALPHABET.length];
  }
  return token;
}

export function generateGameId(): string {
  return randomToken(GAME_ID_LENGTH);
}

/** Fresh seed for a game started without TRICKSY_SEED. */
export function generateSeed(): string {
  return randomToken(SEED_LENGTH).toUpperCase();
}
