import type { AuthUser } from "@runfund/types";
import type { Clock, IdGenerator } from "../common/identity";
import type { UserRecord } from "../users/user.types";

export const FIXED_NOW = new Date("2024-03-01T08:00:00.000Z");

export class ManualClock {
  private current: number;

  constructor(start: Date = FIXED_NOW) {
    this.current = start.getTime();
  }

  readonly now: Clock = () => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Ids look like `00000001000000000000000000000000`, so slug suffixes read `00000001`, `00000002`, ... */
export const createSequentialIds = (): IdGenerator => {
  let counter = 0;
  return () => {
    counter += 1;
    return counter.toString(16).padStart(8, "0").padEnd(32, "0");
  };
};

export const createAuthUser = (overrides: Partial<AuthUser> = {}): AuthUser => ({
  id: "user-runner",
  username: "runner",
  isStaff: false,
  ...overrides
});

export const createUserRecord = (overrides: Partial<UserRecord> = {}): UserRecord => ({
  id: "user-runner",
  username: "runner",
  email: "runner@example.com",
  firstName: "Rita",
  lastName: "Runner",
  height: 170,
  weight: 62,
  profileImageUrl: "",
  isStaff: false,
  isActive: true,
  isVerified: false,
  dateJoined: FIXED_NOW,
  lastLogin: null,
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
  ...overrides
});
