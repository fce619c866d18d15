import assert from "node:assert/strict";
import test from "node:test";
import { ForbiddenException } from "@nestjs/common";
import { assertOwnership, containsPattern, omitUndefined } from "./records";

test("omitUndefined keeps falsy values but drops undefined ones", () => {
  assert.deepEqual(omitUndefined({ name: undefined, distance: 0, isCommercial: false, note: "" }), {
    distance: 0,
    isCommercial: false,
    note: ""
  });
});

test("assertOwnership throws a forbidden error for other actors", () => {
  assert.doesNotThrow(() => assertOwnership("user-1", "user-1", "nope"));
  assert.throws(() => assertOwnership("user-2", "user-1", "Only the owner can do that."), (error: unknown) => {
    assert.ok(error instanceof ForbiddenException);
    assert.equal(error.message, "Only the owner can do that.");
    return true;
  });
});

test("containsPattern escapes regular expression syntax", () => {
  const pattern = containsPattern(" 5k (fun) run ");

  assert.equal(pattern.source, "5k \\(fun\\) run");
  assert.equal(pattern.flags, "i");
  assert.ok(pattern.test("The 5K (FUN) RUN returns"));
});
