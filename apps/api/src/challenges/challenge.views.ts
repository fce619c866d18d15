import type {
  Cause,
  CauseBuyer,
  CauseRunner,
  Challenge,
  SponsorCause,
  SponsorChallenge
} from "@runfund/types";
import type { UserRecord } from "../users/user.types";
import { toOwnerSummary } from "../users/user.views";
import type {
  CauseBuyerRecord,
  CauseRecord,
  CauseRunnerRecord,
  ChallengeRecord,
  PledgeRecord,
  SponsorCauseRecord,
  SponsorChallengeRecord
} from "./challenge.types";

export type UserDirectory = ReadonlyMap<string, UserRecord>;

export const toChallengeView = (
  { createdAt, updatedAt, ownerId, ...challenge }: ChallengeRecord,
  users: UserDirectory
): Challenge => ({
  ...challenge,
  owner: toOwnerSummary(users.get(ownerId)),
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toCauseView = ({ createdAt, updatedAt, ownerId, ...cause }: CauseRecord, users: UserDirectory): Cause => ({
  ...cause,
  owner: toOwnerSummary(users.get(ownerId)),
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toCauseRunnerView = ({ createdAt, updatedAt, dateJoined, ...runner }: CauseRunnerRecord): CauseRunner => ({
  ...runner,
  dateJoined: dateJoined.toISOString()
});

const pledgeTimestamps = ({ createdAt, updatedAt }: PledgeRecord) => ({
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const toSponsorChallengeView = (pledge: SponsorChallengeRecord): SponsorChallenge => ({
  ...pledge,
  ...pledgeTimestamps(pledge)
});

export const toSponsorCauseView = (pledge: SponsorCauseRecord): SponsorCause => ({
  ...pledge,
  ...pledgeTimestamps(pledge)
});

export const toCauseBuyerView = ({ createdAt, updatedAt, dateBought, ...purchase }: CauseBuyerRecord): CauseBuyer => ({
  ...purchase,
  dateBought: dateBought.toISOString()
});
