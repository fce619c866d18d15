import assert from "node:assert/strict";
import test from "node:test";
import { rankLeaderboard } from "./leaderboard";

interface Run {
  id: string;
  ownerId: string;
  distanceCovered: number;
  duration: string;
}

const run = (id: string, ownerId: string, distanceCovered: number, duration = "00:30:00"): Run => ({
  id,
  ownerId,
  distanceCovered,
  duration
});

const ids = (runs: Run[]) => runs.map((entry) => entry.id);

test("rankLeaderboard orders by distance and keeps input order for ties", () => {
  const ranked = rankLeaderboard([run("a", "u1", 3), run("b", "u2", 7.5), run("c", "u3", 3), run("d", "u4", 12)]);

  assert.deepEqual(ids(ranked), ["d", "b", "a", "c"]);
});

test("rankLeaderboard keeps only the best run per owner", () => {
  const ranked = rankLeaderboard([run("a", "u1", 4), run("b", "u1", 9), run("c", "u2", 6), run("d", "u1", 9)]);

  assert.deepEqual(ids(ranked), ["b", "c"]);
});

test("rankLeaderboard skips runs without a duration", () => {
  const ranked = rankLeaderboard([
    run("a", "u1", 10, ""),
    run("b", "u1", 5),
    run("c", "u2", 8, ""),
    run("d", "u3", 1)
  ]);

  assert.deepEqual(ids(ranked), ["b", "d"]);
});

test("rankLeaderboard handles empty and fully unfinished inputs", () => {
  assert.deepEqual(rankLeaderboard([]), []);
  assert.deepEqual(rankLeaderboard([run("a", "u1", 2, ""), run("b", "u2", 3, "")]), []);
});

test("rankLeaderboard is pure and repeatable", () => {
  const input = [run("a", "u1", 1), run("b", "u2", 2), run("c", "u1", 3)];
  const snapshot = structuredClone(input);

  const first = rankLeaderboard(input);
  const second = rankLeaderboard(input);

  assert.deepEqual(first, second);
  assert.deepEqual(input, snapshot);
  assert.deepEqual(ids(first), ["c", "b"]);
});
