import assert from "node:assert/strict";
import test from "node:test";
import { BadRequestException, ForbiddenException, NotFoundException } from "@nestjs/common";
import { createChatGroupInputSchema } from "@runfund/types";
import { UserService } from "../users/user.service";
import { createSequentialIds, createUserRecord, ManualClock } from "../testing/fixtures";
import { InMemoryChatGroupRepository, InMemoryChatMessageRepository } from "../testing/in-memory-chat.repositories";
import { InMemoryUserRepository } from "../testing/in-memory-user.repository";
import { ChatService } from "./chat.service";

const CREATOR = "user-runner";
const FRIEND = "user-two";

const setup = () => {
  const clock = new ManualClock();
  const groups = new InMemoryChatGroupRepository();
  const messages = new InMemoryChatMessageRepository();
  const users = new InMemoryUserRepository([
    createUserRecord(),
    createUserRecord({ id: FRIEND, username: "two", email: "two@example.com" })
  ]);
  const service = new ChatService(groups, messages, new UserService(users, clock.now), createSequentialIds(), clock.now);
  return { clock, groups, messages, service };
};

const group = (name: string) => createChatGroupInputSchema.parse({ name });

test("ChatService.createGroup adds the creator as the first member", async () => {
  const { service } = setup();

  const created = await service.createGroup(CREATOR, group("Morning Crew"));

  assert.equal(created.slug, "morning-crew-00000001");
  assert.equal(created.description, "");
  assert.deepEqual(created.members, [CREATOR]);
  assert.equal((await service.getGroupBySlug(CREATOR, created.slug)).id, created.id);
  await assert.rejects(
    service.getGroupBySlug(FRIEND, created.slug),
    (error: unknown) => error instanceof ForbiddenException && error.message === "Only group members can view this group."
  );
  await assert.rejects(service.getGroupBySlug(CREATOR, "missing"), { message: "Chat group not found." });
});

test("ChatService join and leave keep members unique and the creator in place", async () => {
  const { service } = setup();
  const { slug } = await service.createGroup(CREATOR, group("Morning Crew"));

  await service.joinGroup(FRIEND, slug);
  const joined = await service.joinGroup(FRIEND, slug);
  assert.deepEqual(joined.members, [CREATOR, FRIEND]);

  await assert.rejects(service.leaveGroup(CREATOR, slug), BadRequestException);

  const left = await service.leaveGroup(FRIEND, slug);
  assert.deepEqual(left.members, [CREATOR]);
});

test("ChatService.addMember requires a member inviter and an existing user", async () => {
  const { service } = setup();
  const { slug } = await service.createGroup(CREATOR, group("Morning Crew"));

  await assert.rejects(service.addMember("user-outsider", slug, FRIEND), ForbiddenException);
  await assert.rejects(
    service.addMember(CREATOR, slug, "user-ghost"),
    (error: unknown) => error instanceof NotFoundException && error.message === "User not found."
  );

  const updated = await service.addMember(CREATOR, slug, FRIEND);
  assert.deepEqual(updated.members, [CREATOR, FRIEND]);
});

test("ChatService.removeMember lets the creator or the member themselves remove a member", async () => {
  const { service } = setup();
  const { slug } = await service.createGroup(CREATOR, group("Morning Crew"));
  await service.joinGroup(FRIEND, slug);
  await service.joinGroup("user-three", slug);

  await assert.rejects(service.removeMember(FRIEND, slug, "user-three"), {
    message: "Only the group creator can remove other members."
  });
  await assert.rejects(service.removeMember(CREATOR, slug, CREATOR), BadRequestException);

  await service.removeMember(FRIEND, slug, FRIEND);
  const remaining = await service.removeMember(CREATOR, slug, "user-three");
  assert.deepEqual(remaining.members, [CREATOR]);
});

test("ChatService messages are limited to members and listed newest first", async () => {
  const { service, clock } = setup();
  const { slug } = await service.createGroup(CREATOR, group("Morning Crew"));

  await assert.rejects(service.sendMessage(FRIEND, slug, "Hello?"), {
    message: "Only group members can send messages."
  });

  await service.joinGroup(FRIEND, slug);
  const first = await service.sendMessage(CREATOR, slug, "Run at six");
  clock.advance(1_000);
  const second = await service.sendMessage(FRIEND, slug, "Count me in");

  const page = await service.listMessages(FRIEND, slug, { page: 1, limit: 20 });
  assert.deepEqual(
    page.items.map((message) => message.content),
    ["Count me in", "Run at six"]
  );
  await assert.rejects(service.listMessages("user-outsider", slug, { page: 1, limit: 20 }), ForbiddenException);

  await assert.rejects(service.updateMessage(FRIEND, first.id, "Run at seven"), {
    message: "Only the sender can change this message."
  });
  const edited = await service.updateMessage(CREATOR, first.id, "Run at seven");
  assert.equal(edited.content, "Run at seven");
  assert.equal(edited.updatedAt.toISOString(), "2024-03-01T08:00:01.000Z");

  await assert.rejects(service.deleteMessage(FRIEND, first.id), ForbiddenException);
  await service.deleteMessage(CREATOR, second.id);
  await service.deleteMessage(CREATOR, first.id);
  await assert.rejects(service.updateMessage(CREATOR, first.id, "Gone"), { message: "Message not found." });
});

test("ChatService lists a member's groups, searches by name and limits edits to the creator", async () => {
  const { service, clock } = setup();
  const morning = await service.createGroup(CREATOR, group("Morning Crew"));
  clock.advance(1_000);
  await service.createGroup(FRIEND, group("Night Owls"));
  clock.advance(1_000);
  await service.createGroup(CREATOR, group("Crew Two"));

  const mine = await service.listGroupsForUser(CREATOR, { page: 1, limit: 10 });
  assert.deepEqual(
    mine.items.map((entry) => entry.name),
    ["Crew Two", "Morning Crew"]
  );
  assert.deepEqual(
    (await service.searchGroups(" crew ")).map((entry) => entry.name),
    ["Crew Two", "Morning Crew"]
  );

  await assert.rejects(service.updateGroup(FRIEND, morning.slug, { name: "Taken" }), ForbiddenException);
  const renamed = await service.updateGroup(CREATOR, morning.slug, { name: "Dawn Crew" });
  assert.equal(renamed.name, "Dawn Crew");
  assert.equal(renamed.slug, "morning-crew-00000001");

  await assert.rejects(service.deleteGroup(FRIEND, morning.slug), { message: "Only the group creator can delete it." });
  await service.deleteGroup(CREATOR, morning.slug);
  await assert.rejects(service.getGroupBySlug(CREATOR, morning.slug), NotFoundException);
});

test("ChatService.createGroup adds existing invitees once and keeps the image", async () => {
  const { service } = setup();

  const created = await service.createGroup(
    CREATOR,
    createChatGroupInputSchema.parse({
      name: "Track Club",
      image: "https://cdn.runfund.test/track.png",
      memberIds: [FRIEND, CREATOR, FRIEND]
    })
  );

  assert.deepEqual(created.members, [CREATOR, FRIEND]);
  assert.equal(created.image, "https://cdn.runfund.test/track.png");

  await assert.rejects(
    service.createGroup(CREATOR, createChatGroupInputSchema.parse({ name: "Ghosts", memberIds: [FRIEND, "user-ghost"] })),
    (error: unknown) => error instanceof NotFoundException && error.message === "Unknown group members: user-ghost."
  );
});

test("ChatService.listMessagesBySender returns one member's messages, newest first", async () => {
  const { service, clock } = setup();
  const { slug } = await service.createGroup(
    CREATOR,
    createChatGroupInputSchema.parse({ name: "Morning Crew", memberIds: [FRIEND] })
  );

  await service.sendMessage(CREATOR, slug, "Run at six");
  clock.advance(1_000);
  await service.sendMessage(FRIEND, slug, "Count me in");
  clock.advance(1_000);
  await service.sendMessage(CREATOR, slug, "Bring water");

  const page = await service.listMessagesBySender(FRIEND, slug, CREATOR, { page: 1, limit: 20 });
  assert.deepEqual(
    page.items.map((message) => message.content),
    ["Bring water", "Run at six"]
  );
  await assert.rejects(
    service.listMessagesBySender("user-outsider", slug, CREATOR, { page: 1, limit: 20 }),
    ForbiddenException
  );
});
