import type { OwnerSummary, PublicUser, UserProfile } from "@runfund/types";
import type { UserRecord } from "./user.types";

export const toPublicUser = (user: UserRecord): PublicUser => ({
  id: user.id,
  username: user.username,
  firstName: user.firstName,
  lastName: user.lastName,
  profileImageUrl: user.profileImageUrl,
  dateJoined: user.dateJoined.toISOString()
});

export const toUserProfile = (user: UserRecord): UserProfile => ({
  ...toPublicUser(user),
  email: user.email,
  height: user.height,
  weight: user.weight,
  isStaff: user.isStaff,
  isActive: user.isActive,
  isVerified: user.isVerified,
  lastLogin: user.lastLogin ? user.lastLogin.toISOString() : null
});

export const toOwnerSummary = (user: UserRecord | undefined): OwnerSummary | null =>
  user
    ? {
        id: user.id,
        fullName: `${user.firstName} ${user.lastName}`.trim(),
        username: user.username
      }
    : null;
