import { ConflictException, Inject, Injectable, NotFoundException } from "@nestjs/common";
import type { Page, RegisterProfileInput, UpdateProfileInput, UserListQuery, UserStats } from "@runfund/types";
import { CLOCK, type Clock } from "../common/identity";
import { toPage, toRange } from "../common/pagination";
import { omitUndefined } from "../common/records";
import { createModuleLogger } from "../observability/logger";
import { USER_REPOSITORY, type UserRepository } from "./user.repository";
import type { UserPatch, UserRecord } from "./user.types";

@Injectable()
export class UserService {
  private readonly logger = createModuleLogger("UserService");

  constructor(
    @Inject(USER_REPOSITORY) private readonly users: UserRepository,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /**
   * Creates the profile for an account the gateway has already authenticated;
   * the account id becomes the user id.
   */
  async registerProfile(userId: string, input: RegisterProfileInput): Promise<UserRecord> {
    if (await this.users.findById(userId)) {
      throw new ConflictException("A profile already exists for this account.");
    }

    const username = normalizeUsername(input.username);
    const email = normalizeEmail(input.email);
    await this.ensureAvailable(userId, { username, email });

    const now = this.clock();
    const user = await this.users.create({
      id: userId,
      username,
      email,
      firstName: input.firstName,
      lastName: input.lastName,
      height: input.height,
      weight: input.weight,
      profileImageUrl: input.profileImageUrl,
      isStaff: false,
      isActive: true,
      isVerified: false,
      dateJoined: now,
      lastLogin: now,
      createdAt: now,
      updatedAt: now
    });

    this.logger.info({ event: "user.registered", userId }, "User profile registered");

    return user;
  }

  async getUserById(id: string): Promise<UserRecord> {
    const user = await this.users.findById(id);

    if (!user) {
      throw new NotFoundException("User not found.");
    }

    return user;
  }

  async getUserByUsername(username: string): Promise<UserRecord> {
    const user = await this.users.findByUsername(normalizeUsername(username));

    if (!user) {
      throw new NotFoundException("User not found.");
    }

    return user;
  }

  /** Reading your own profile counts as a login. */
  async getOwnProfile(userId: string): Promise<UserRecord> {
    await this.getUserById(userId);
    return this.applyPatch(userId, { lastLogin: this.clock() });
  }

  async getUsersByIds(ids: readonly string[]): Promise<Map<string, UserRecord>> {
    const unique = Array.from(new Set(ids));

    if (unique.length === 0) {
      return new Map();
    }

    const users = await this.users.findByIds(unique);
    return new Map(users.map((user) => [user.id, user]));
  }

  async updateProfile(userId: string, input: UpdateProfileInput): Promise<UserRecord> {
    const current = await this.getUserById(userId);
    const patch: UserPatch = omitUndefined({
      ...input,
      username: input.username === undefined ? undefined : normalizeUsername(input.username),
      email: input.email === undefined ? undefined : normalizeEmail(input.email)
    });

    await this.ensureAvailable(current.id, {
      username: patch.username !== current.username ? patch.username : undefined,
      email: patch.email !== current.email ? patch.email : undefined
    });

    return this.applyPatch(userId, { ...patch, updatedAt: this.clock() });
  }

  /** Removes the profile only; challenges, runs and pledges the user created stay. */
  async deleteAccount(userId: string): Promise<void> {
    if (!(await this.users.delete(userId))) {
      throw new NotFoundException("User not found.");
    }

    this.logger.info({ event: "user.deleted", userId }, "User account deleted");
  }

  async listUsers(query: UserListQuery): Promise<Page<UserRecord>> {
    const users = await this.users.list({ ...toRange(query), search: query.search });
    return toPage(users, query);
  }

  async getUserStats(): Promise<UserStats> {
    return this.users.countStats();
  }

  async setActive(userId: string, isActive: boolean): Promise<UserRecord> {
    const user = await this.applyPatch(userId, { isActive, updatedAt: this.clock() });
    this.logger.info({ event: "user.active_changed", userId, isActive }, "User activation changed");
    return user;
  }

  async setStaff(userId: string, isStaff: boolean): Promise<UserRecord> {
    const user = await this.applyPatch(userId, { isStaff, updatedAt: this.clock() });
    this.logger.info({ event: "user.staff_changed", userId, isStaff }, "User staff flag changed");
    return user;
  }

  async markVerified(userId: string): Promise<UserRecord> {
    return this.applyPatch(userId, { isVerified: true, updatedAt: this.clock() });
  }

  private async applyPatch(userId: string, patch: UserPatch): Promise<UserRecord> {
    const updated = await this.users.update(userId, patch);

    if (!updated) {
      throw new NotFoundException("User not found.");
    }

    return updated;
  }

  private async ensureAvailable(userId: string, candidate: { username?: string; email?: string }) {
    if (candidate.username) {
      const existing = await this.users.findByUsername(candidate.username);
      if (existing && existing.id !== userId) {
        throw new ConflictException("Username is already taken.");
      }
    }

    if (candidate.email) {
      const existing = await this.users.findByEmail(candidate.email);
      if (existing && existing.id !== userId) {
        throw new ConflictException("Email is already registered.");
      }
    }
  }
}

/** Usernames keep their case; `Runner` and `runner` are different accounts. */
const normalizeUsername = (value: string): string => value.trim();

const normalizeEmail = (value: string): string => value.trim().toLowerCase();
