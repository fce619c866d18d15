import { metrics, trace } from "@opentelemetry/api";

const SERVICE_NAME = "runfund-api";

export const apiTracer = trace.getTracer(SERVICE_NAME);

const meter = metrics.getMeter(SERVICE_NAME);

export const activityDistanceHistogram = meter.createHistogram("causes.activity.distance_km", {
  description: "Distance covered per recorded cause activity"
});

export const campaignRunDistanceHistogram = meter.createHistogram("campaigns.run.distance_km", {
  description: "Distance added per finished campaign run"
});

export const pledgeAmountHistogram = meter.createHistogram("sponsorships.pledge.total_amount", {
  description: "Total amount committed by sponsor pledges"
});

export const pledgeCounter = meter.createCounter("sponsorships.pledges", {
  description: "Sponsor pledges created or recomputed"
});

export const authFailureCounter = meter.createCounter("auth.failures", {
  description: "Requests rejected by the auth guard"
});
