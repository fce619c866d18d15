import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "sponsor_campaigns", versionKey: false })
export class SponsorCampaignEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare campaignId: string;

  @Prop({ type: String, required: true, index: true })
  declare sponsorId: string;

  @Prop({ type: Number, required: true, min: 0 })
  declare distance: number;

  @Prop({ type: Number, required: true, min: 0 })
  declare amountPerKm: number;

  @Prop({ type: Number, required: true, min: 0 })
  declare totalAmount: number;

  @Prop({ type: String, default: "" })
  declare brandImg: string;

  @Prop({ type: String, default: "" })
  declare videoUrl: string;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const SponsorCampaignSchema = SchemaFactory.createForClass(SponsorCampaignEntity);
