import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "campaign_runners", versionKey: false })
export class CampaignRunnerEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare campaignId: string;

  @Prop({ type: String, required: true, index: true })
  declare ownerId: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare distanceCovered: number;

  @Prop({ type: String, default: "" })
  declare duration: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare moneyRaised: number;

  @Prop({ type: String, default: "" })
  declare coverImage: string;

  @Prop({ type: String, default: "" })
  declare activity: string;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare dateJoined: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const CampaignRunnerSchema = SchemaFactory.createForClass(CampaignRunnerEntity);
