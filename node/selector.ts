import { EmptySelectionError } from "./errors.js";

export function selectRandomElement<T>(
  items: readonly T[],
  random: () => number = Math.random
): T {
  if (items.length === 0) {
    throw new EmptySelectionError();
  }
  const randomIndex = Math.floor(random() * items.length);
  return items[Math.min(randomIndex, items.length - 1)];
}
