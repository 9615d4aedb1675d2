import type { GroupType } from "./group";
import type { SeededRandom } from "./random";

export type SplitResult<T> = Record<GroupType, T[]>;

/** Fisher-Yates shuffle on a copy, the input is not mutated */
export function shuffle<T>(items: readonly T[], random: SeededRandom): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * @description
 * - The first `floor(total * train_split)` shuffled items go to train, the rest to val.
 * - Same items in the same order with the same seed always give the same split.
 */
export function splitDataset<T>(
  items: readonly T[],
  options: {
    train_split: number;
    random: SeededRandom;
  }
): SplitResult<T> {
  const { train_split, random } = options;
  const shuffled = shuffle(items, random);
  const train_count = Math.floor(shuffled.length * train_split);
  return {
    train: shuffled.slice(0, train_count),
    val: shuffled.slice(train_count),
  };
}
