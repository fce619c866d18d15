import assert from "node:assert/strict";
import test from "node:test";
import { ConflictException, NotFoundException, ServiceUnavailableException } from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { z } from "zod";
import { parseInput } from "../common/validation";
import { buildErrorEnvelope, HttpErrorFilter, resolveHttpError } from "./http-error.filter";

class FakeReply {
  statusCode = 200;
  payload: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  send(payload: unknown): this {
    this.payload = payload;
    return this;
  }
}

const captureThrown = (run: () => unknown): unknown => {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
};

test("resolveHttpError maps Nest exceptions onto envelope codes", () => {
  assert.deepEqual(resolveHttpError(new NotFoundException("Cause not found.")), {
    status: 404,
    code: "NOT_FOUND",
    message: "Cause not found."
  });
  assert.deepEqual(resolveHttpError(new ConflictException("Username is already taken.")), {
    status: 409,
    code: "CONFLICT",
    message: "Username is already taken."
  });
  assert.deepEqual(resolveHttpError(new ServiceUnavailableException("Database unavailable.")), {
    status: 503,
    code: "UNAVAILABLE",
    message: "Database unavailable."
  });
});

test("resolveHttpError keeps validation issues from parseInput", () => {
  const error = captureThrown(() => parseInput(z.object({ name: z.string().min(1) }), { name: "" }));

  assert.deepEqual(resolveHttpError(error), {
    status: 400,
    code: "INVALID_INPUT",
    message: "Request validation failed.",
    issues: [{ path: "name", message: "String must contain at least 1 character(s)" }]
  });
});

test("resolveHttpError maps duplicate keys, client errors and unknown failures", () => {
  const duplicate = Object.assign(new Error("E11000 duplicate key error"), { code: 11000 });
  assert.equal(resolveHttpError(duplicate).code, "CONFLICT");
  assert.equal(resolveHttpError(duplicate).status, 409);

  const blocked = Object.assign(new Error("Origin not allowed"), { statusCode: 403 });
  assert.deepEqual(resolveHttpError(blocked), { status: 403, code: "FORBIDDEN", message: "Origin not allowed" });

  assert.deepEqual(resolveHttpError(new Error("socket hang up")), {
    status: 500,
    code: "INTERNAL",
    message: "Internal server error."
  });
  assert.equal(resolveHttpError("plain string").code, "INTERNAL");
});

test("buildErrorEnvelope stamps the request id and time", () => {
  const envelope = buildErrorEnvelope(
    { status: 404, code: "NOT_FOUND", message: "Post not found." },
    "req-7",
    new Date("2024-03-01T08:00:00.000Z")
  );

  assert.deepEqual(envelope, {
    code: "NOT_FOUND",
    message: "Post not found.",
    requestId: "req-7",
    timestamp: "2024-03-01T08:00:00.000Z"
  });
});

test("HttpErrorFilter writes the envelope with the resolved status", () => {
  const reply = new FakeReply();
  const host = new ExecutionContextHost([{ id: "req-9", url: "/api/posts/missing" }, reply]);

  new HttpErrorFilter().catch(new NotFoundException("Post not found."), host);

  assert.equal(reply.statusCode, 404);
  const envelope = z
    .object({ code: z.string(), message: z.string(), requestId: z.string(), timestamp: z.string() })
    .parse(reply.payload);
  assert.equal(envelope.code, "NOT_FOUND");
  assert.equal(envelope.message, "Post not found.");
  assert.equal(envelope.requestId, "req-9");
});
