import { PERSONAS, type PersonaName } from "../utils/types";

export type RandomSource = () => number;

export function pick<T>(items: readonly T[], random: RandomSource): T {
  const idx = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[idx];
}

export function pickPersona(random: RandomSource = Math.random): PersonaName {
  return pick(PERSONAS, random);
}

