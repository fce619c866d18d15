export interface UserRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  height: number;
  weight: number;
  profileImageUrl: string;
  isStaff: boolean;
  isActive: boolean;
  isVerified: boolean;
  dateJoined: Date;
  lastLogin: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type UserPatch = Partial<Omit<UserRecord, "id" | "createdAt" | "dateJoined">>;
