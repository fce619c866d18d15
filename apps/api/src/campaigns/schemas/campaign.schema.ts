import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import type { Activity, ChallengeMode } from "@runfund/types";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "campaigns", versionKey: false })
export class CampaignEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare ownerId: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 100 })
  declare name: string;

  @Prop({ type: String, default: "" })
  declare description: string;

  @Prop({ type: String, default: "" })
  declare condition: string;

  @Prop({ type: String, enum: ["Free", "Paid"], required: true, default: "Free" })
  declare mode: ChallengeMode;

  @Prop({ type: String, default: "" })
  declare goal: string;

  @Prop({ type: String, enum: ["Walking", "Running", "Cycling"], required: true })
  declare activity: Activity;

  @Prop({ type: Boolean, default: false })
  declare acceptTac: boolean;

  @Prop({ type: String, default: "" })
  declare location: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare moneyRaised: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare targetAmount: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare targetAmountPerKm: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare distanceToCover: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare distanceCovered: number;

  @Prop({ type: String, default: "" })
  declare startDuration: string;

  @Prop({ type: String, default: "" })
  declare endDuration: string;

  @Prop({ type: String, default: "" })
  declare workoutImg: string;

  @Prop({ type: String, required: true, unique: true })
  declare slug: string;

  @Prop({ type: [String], default: [] })
  declare members: string[];

  @Prop({ type: [String], default: [] })
  declare sponsors: string[];

  @Prop({ type: SchemaTypes.Date, required: true, index: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const CampaignSchema = SchemaFactory.createForClass(CampaignEntity);
