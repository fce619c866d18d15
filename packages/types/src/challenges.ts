import { z } from "zod";
import { MAX_PAGE_SIZE, ownerSummarySchema } from "./common";

export const challengeModeSchema = z.enum(["Free", "Paid"]);
export const activitySchema = z.enum(["Walking", "Running", "Cycling"]);

const text = (max = 5000) => z.string().trim().max(max).default("");
const amount = () => z.number().finite().nonnegative().default(0);
const positive = () => z.number().finite().positive();

export const createChallengeInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: text(),
  mode: challengeModeSchema.default("Free"),
  condition: text(),
  goal: text(),
  location: text(255),
  distanceToCover: amount(),
  targetAmount: amount(),
  targetAmountPerKm: amount(),
  startDuration: text(64),
  endDuration: text(64),
  noOfWinner: z.number().int().nonnegative().default(0),
  winningPrice: z.array(z.number().finite().nonnegative()).default([]),
  causePrice: z.array(z.number().finite().nonnegative()).default([]),
  coverImage: text(2048),
  videoUrl: text(2048)
});

export const updateChallengeInputSchema = createChallengeInputSchema.partial();

export const createCauseInputSchema = z.object({
  challengeId: z.string().trim().min(1),
  name: z.string().trim().min(1).max(100),
  problem: text(),
  solution: text(),
  productDescription: text(),
  activity: activitySchema,
  location: text(255),
  description: text(),
  isCommercial: z.boolean().default(false),
  whoIdeaImpact: text(),
  amountPerPiece: amount(),
  duration: text(64),
  fundCause: z.boolean().default(false),
  fundAmount: amount(),
  willingAmount: amount(),
  unitPrice: amount(),
  costToLaunch: text(255),
  benefitDesc: text(),
  workoutImg: text(2048),
  videoUrl: text(2048)
});

export const updateCauseInputSchema = createCauseInputSchema.omit({ challengeId: true }).partial();

/**
 * An empty `duration` marks an activity that has not been finished yet; such
 * runs count towards the cause distance but never reach the leaderboard.
 */
export const recordActivityInputSchema = z.object({
  causeId: z.string().trim().min(1),
  distanceToCover: positive(),
  distanceCovered: positive(),
  duration: text(64),
  activity: activitySchema,
  coverImage: text(2048)
});

const pledgeFields = {
  distance: positive(),
  amountPerKm: positive(),
  brandImg: text(2048),
  videoUrl: text(2048)
};

export const sponsorChallengeInputSchema = z.object({
  challengeId: z.string().trim().min(1),
  ...pledgeFields
});

export const sponsorCauseInputSchema = z.object({
  causeId: z.string().trim().min(1),
  ...pledgeFields
});

export const updatePledgeInputSchema = z
  .object(pledgeFields)
  .partial()
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: "At least one pledge field must be provided."
  });

export const buyCauseInputSchema = z.object({
  causeId: z.string().trim().min(1),
  amount: positive()
});

export const leaderboardQuerySchema = z.object({
  causeId: z.string().trim().min(1).optional().catch(undefined),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional().catch(undefined)
});

export const challengeSchema = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
  description: z.string(),
  mode: challengeModeSchema,
  condition: z.string(),
  goal: z.string(),
  location: z.string(),
  distanceToCover: z.number(),
  targetAmount: z.number(),
  targetAmountPerKm: z.number(),
  startDuration: z.string(),
  endDuration: z.string(),
  noOfWinner: z.number().int(),
  winningPrice: z.array(z.number()),
  causePrice: z.array(z.number()),
  coverImage: z.string(),
  videoUrl: z.string(),
  members: z.array(z.string()),
  owner: ownerSummarySchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const causeSchema = z.object({
  id: z.string(),
  slug: z.string(),
  challengeId: z.string(),
  name: z.string(),
  problem: z.string(),
  solution: z.string(),
  productDescription: z.string(),
  activity: activitySchema,
  location: z.string(),
  description: z.string(),
  isCommercial: z.boolean(),
  whoIdeaImpact: z.string(),
  distanceCovered: z.number(),
  amountPerPiece: z.number(),
  duration: z.string(),
  fundCause: z.boolean(),
  fundAmount: z.number(),
  willingAmount: z.number(),
  unitPrice: z.number(),
  costToLaunch: z.string(),
  benefitDesc: z.string(),
  workoutImg: z.string(),
  videoUrl: z.string(),
  members: z.array(z.string()),
  owner: ownerSummarySchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const causeRunnerSchema = z.object({
  id: z.string(),
  causeId: z.string(),
  ownerId: z.string(),
  distanceToCover: z.number(),
  distanceCovered: z.number(),
  duration: z.string(),
  moneyRaised: z.number(),
  coverImage: z.string(),
  activity: z.string(),
  dateJoined: z.string()
});

const pledgeViewFields = {
  id: z.string(),
  sponsorId: z.string(),
  distance: z.number(),
  amountPerKm: z.number(),
  totalAmount: z.number(),
  brandImg: z.string(),
  videoUrl: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
};

export const sponsorChallengeSchema = z.object({ challengeId: z.string(), ...pledgeViewFields });
export const sponsorCauseSchema = z.object({ causeId: z.string(), ...pledgeViewFields });

export const causeBuyerSchema = z.object({
  id: z.string(),
  buyerId: z.string(),
  causeId: z.string(),
  amount: z.number(),
  dateBought: z.string()
});

export const leaderboardEntrySchema = causeRunnerSchema.extend({
  rank: z.number().int().min(1),
  username: z.string()
});

export const recordActivityResultSchema = z.object({
  message: z.string(),
  runner: causeRunnerSchema
});

export type ChallengeMode = z.infer<typeof challengeModeSchema>;
export type Activity = z.infer<typeof activitySchema>;
export type CreateChallengeInput = z.infer<typeof createChallengeInputSchema>;
export type UpdateChallengeInput = z.infer<typeof updateChallengeInputSchema>;
export type CreateCauseInput = z.infer<typeof createCauseInputSchema>;
export type UpdateCauseInput = z.infer<typeof updateCauseInputSchema>;
export type RecordActivityInput = z.infer<typeof recordActivityInputSchema>;
export type SponsorChallengeInput = z.infer<typeof sponsorChallengeInputSchema>;
export type SponsorCauseInput = z.infer<typeof sponsorCauseInputSchema>;
export type UpdatePledgeInput = z.infer<typeof updatePledgeInputSchema>;
export type BuyCauseInput = z.infer<typeof buyCauseInputSchema>;
export type LeaderboardQuery = z.infer<typeof leaderboardQuerySchema>;
export type Challenge = z.infer<typeof challengeSchema>;
export type Cause = z.infer<typeof causeSchema>;
export type CauseRunner = z.infer<typeof causeRunnerSchema>;
export type SponsorChallenge = z.infer<typeof sponsorChallengeSchema>;
export type SponsorCause = z.infer<typeof sponsorCauseSchema>;
export type CauseBuyer = z.infer<typeof causeBuyerSchema>;
export type LeaderboardEntry = z.infer<typeof leaderboardEntrySchema>;
export type RecordActivityResult = z.infer<typeof recordActivityResultSchema>;
