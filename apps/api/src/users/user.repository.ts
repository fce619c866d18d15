import type { UserStats } from "@runfund/types";
import type { Range } from "../common/pagination";
import type { UserPatch, UserRecord } from "./user.types";

export const USER_REPOSITORY = Symbol("USER_REPOSITORY");

export interface UserListFilter extends Range {
  search?: string;
}

export interface UserRepository {
  create(user: UserRecord): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByIds(ids: readonly string[]): Promise<UserRecord[]>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Oldest accounts first; `search` matches names, username and email case-insensitively. */
  list(filter: UserListFilter): Promise<UserRecord[]>;
  countStats(): Promise<UserStats>;
}
