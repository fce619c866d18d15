import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException, ForbiddenException, NotFoundException } from "@nestjs/common";
import { createCommentInputSchema } from "@runfund/types";
import { createSequentialIds, ManualClock } from "../testing/fixtures";
import { InMemoryCommentRepository } from "../testing/in-memory-post.repositories";
import { CommentService } from "./comment.service";

const setup = () => {
  const repository = new InMemoryCommentRepository();
  const clock = new ManualClock();
  const service = new CommentService(repository, createSequentialIds(), clock.now);
  return { repository, clock, service };
};

const onPost = (content: string, parentId?: string) =>
  createCommentInputSchema.parse({ targetType: "post", targetId: "post-1", content, parentId });

test("CommentService.createComment threads replies under a parent on the same target", async () => {
  const { service } = setup();

  const root = await service.createComment("user-a", onPost("  Great read  "));
  const reply = await service.createComment("user-b", onPost("Agreed", root.id));

  assert.equal(root.content, "Great read");
  assert.equal(root.parentId, null);
  assert.equal(reply.parentId, root.id);

  const page = await service.listByTarget("post", "post-1", { page: 1, limit: 50 });
  assert.deepEqual(
    page.items.map((comment) => comment.id),
    [root.id]
  );
  assert.deepEqual(
    (await service.listReplies(root.id)).map((comment) => comment.content),
    ["Agreed"]
  );
});

test("CommentService.createComment rejects missing or foreign parents", async () => {
  const { service, repository } = setup();
  const root = await service.createComment("user-a", onPost("First"));

  await assert.rejects(
    service.createComment("user-b", onPost("Lost", "missing")),
    (error: unknown) => error instanceof NotFoundException && error.message === "Parent comment not found."
  );
  await assert.rejects(
    service.createComment(
      "user-b",
      createCommentInputSchema.parse({ targetType: "challenge", targetId: "post-1", parentId: root.id, content: "Wrong place" })
    ),
    BadRequestException
  );
  assert.equal(repository.comments.size, 1);
});

test("CommentService only lets the author change or delete a comment", async () => {
  const { service, clock, repository } = setup();
  const root = await service.createComment("user-a", onPost("Draft thought"));
  await service.createComment("user-b", onPost("Reply", root.id));
  clock.advance(30_000);

  await assert.rejects(service.updateComment("user-b", root.id, { content: "Edited" }), {
    message: "Only the author can change this comment."
  });
  await assert.rejects(service.deleteComment("user-b", root.id), ForbiddenException);

  const edited = await service.updateComment("user-a", root.id, { content: "Final thought" });
  assert.equal(edited.content, "Final thought");
  assert.equal(edited.updatedAt.toISOString(), "2024-03-01T08:00:30.000Z");

  await service.deleteComment("user-a", root.id);
  await assert.rejects(service.listReplies(root.id), NotFoundException);
  assert.equal(repository.comments.size, 1);
});

test("CommentService.listByTarget pages top-level comments oldest first", async () => {
  const { service } = setup();

  for (const content of ["one", "two", "three"]) {
    await service.createComment("user-a", onPost(content));
  }

  const second = await service.listByTarget("post", "post-1", { page: 2, limit: 2 });
  assert.deepEqual(
    second.items.map((comment) => comment.content),
    ["three"]
  );
  assert.equal((await service.listByTarget("post", "post-2", { page: 1, limit: 50 })).items.length, 0);
});
