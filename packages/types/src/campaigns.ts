import { z } from "zod";
import {
  activitySchema,
  causeRunnerSchema,
  challengeModeSchema,
  sponsorCauseInputSchema,
  updatePledgeInputSchema
} from "./challenges";
import { ownerSummarySchema, paginationSchema } from "./common";

const text = (max = 5000) => z.string().trim().max(max).default("");
const amount = () => z.number().finite().nonnegative().default(0);

export const createCampaignInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: text(),
  condition: text(),
  mode: challengeModeSchema.default("Free"),
  goal: text(),
  activity: activitySchema.default("Running"),
  location: text(255),
  targetAmount: amount(),
  targetAmountPerKm: amount(),
  distanceToCover: amount(),
  startDuration: text(64),
  endDuration: text(64),
  workoutImg: text(2048)
});

export const updateCampaignInputSchema = createCampaignInputSchema
  .partial()
  .extend({ acceptTac: z.boolean().optional() });

export const campaignSearchQuerySchema = paginationSchema.extend({
  q: z.string().trim().min(1).max(100)
});

export const participateCampaignInputSchema = z.object({
  activity: activitySchema
});

/** Distance and money are added to the run; the duration replaces the stored one. */
export const finishCampaignRunInputSchema = z.object({
  distanceCovered: z.number().finite().positive(),
  duration: z.string().trim().min(1).max(64),
  moneyRaised: amount()
});

export const sponsorCampaignInputSchema = sponsorCauseInputSchema.omit({ causeId: true });

export const campaignLeaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().catch(undefined)
});

export const createCampaignRunnerInputSchema = z.object({
  campaignId: z.string().trim().min(1),
  userId: z.string().trim().min(1),
  activity: activitySchema,
  distanceCovered: amount(),
  duration: text(64),
  moneyRaised: amount()
});

export const updateCampaignRunnerInputSchema = z
  .object({
    activity: activitySchema,
    distanceCovered: z.number().finite().nonnegative(),
    duration: z.string().trim().max(64),
    moneyRaised: z.number().finite().nonnegative(),
    coverImage: z.string().trim().max(2048)
  })
  .partial();

export const campaignRunnerListQuerySchema = paginationSchema.extend({
  campaignId: z.string().trim().min(1).optional().catch(undefined),
  userId: z.string().trim().min(1).optional().catch(undefined)
});

export const createSponsorCampaignInputSchema = sponsorCampaignInputSchema.extend({
  campaignId: z.string().trim().min(1),
  sponsorId: z.string().trim().min(1)
});

export const updateSponsorCampaignInputSchema = updatePledgeInputSchema;

export const sponsorCampaignListQuerySchema = paginationSchema.extend({
  campaignId: z.string().trim().min(1).optional().catch(undefined)
});

export const campaignSchema = z.object({
  id: z.string(),
  slug: z.string(),
  name: z.string(),
  description: z.string(),
  condition: z.string(),
  mode: challengeModeSchema,
  goal: z.string(),
  activity: activitySchema,
  acceptTac: z.boolean(),
  location: z.string(),
  moneyRaised: z.number(),
  targetAmount: z.number(),
  targetAmountPerKm: z.number(),
  distanceToCover: z.number(),
  distanceCovered: z.number(),
  startDuration: z.string(),
  endDuration: z.string(),
  workoutImg: z.string(),
  members: z.array(z.string()),
  sponsors: z.array(z.string()),
  owner: ownerSummarySchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const campaignRunnerSchema = causeRunnerSchema
  .omit({ causeId: true, distanceToCover: true })
  .extend({ campaignId: z.string() });

export const sponsorCampaignSchema = z.object({
  id: z.string(),
  campaignId: z.string(),
  sponsorId: z.string(),
  distance: z.number(),
  amountPerKm: z.number(),
  totalAmount: z.number(),
  brandImg: z.string(),
  videoUrl: z.string(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const campaignLeaderboardEntrySchema = campaignRunnerSchema.extend({
  rank: z.number().int().min(1),
  username: z.string()
});

export const campaignMessageSchema = z.object({
  message: z.string()
});

export const participateCampaignResultSchema = z.object({
  message: z.string(),
  runner: campaignRunnerSchema
});

export type CreateCampaignInput = z.infer<typeof createCampaignInputSchema>;
export type UpdateCampaignInput = z.infer<typeof updateCampaignInputSchema>;
export type CampaignSearchQuery = z.infer<typeof campaignSearchQuerySchema>;
export type ParticipateCampaignInput = z.infer<typeof participateCampaignInputSchema>;
export type FinishCampaignRunInput = z.infer<typeof finishCampaignRunInputSchema>;
export type SponsorCampaignInput = z.infer<typeof sponsorCampaignInputSchema>;
export type CreateCampaignRunnerInput = z.infer<typeof createCampaignRunnerInputSchema>;
export type UpdateCampaignRunnerInput = z.infer<typeof updateCampaignRunnerInputSchema>;
export type CampaignRunnerListQuery = z.infer<typeof campaignRunnerListQuerySchema>;
export type CreateSponsorCampaignInput = z.infer<typeof createSponsorCampaignInputSchema>;
export type UpdateSponsorCampaignInput = z.infer<typeof updateSponsorCampaignInputSchema>;
export type SponsorCampaignListQuery = z.infer<typeof sponsorCampaignListQuerySchema>;
export type Campaign = z.infer<typeof campaignSchema>;
export type CampaignRunner = z.infer<typeof campaignRunnerSchema>;
export type SponsorCampaign = z.infer<typeof sponsorCampaignSchema>;
export type CampaignLeaderboardEntry = z.infer<typeof campaignLeaderboardEntrySchema>;
export type CampaignMessage = z.infer<typeof campaignMessageSchema>;
export type ParticipateCampaignResult = z.infer<typeof participateCampaignResultSchema>;
