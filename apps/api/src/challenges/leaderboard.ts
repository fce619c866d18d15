import type { CauseRunnerRecord } from "./challenge.types";

type RankableRunner = Pick<CauseRunnerRecord, "ownerId" | "distanceCovered" | "duration">;

/**
 * Orders runners by distance covered (descending, ties keep input order) and
 * keeps one entry per owner: the best-placed run that has a duration. Runs
 * without a duration never appear, even when they are an owner's only run.
 */
export const rankLeaderboard = <TRunner extends RankableRunner>(runners: readonly TRunner[]): TRunner[] => {
  const sorted = [...runners].sort((left, right) => right.distanceCovered - left.distanceCovered);
  const seen = new Set<string>();
  const ranked: TRunner[] = [];

  for (const runner of sorted) {
    if (runner.duration === "" || seen.has(runner.ownerId)) {
      continue;
    }

    seen.add(runner.ownerId);
    ranked.push(runner);
  }

  return ranked;
};
