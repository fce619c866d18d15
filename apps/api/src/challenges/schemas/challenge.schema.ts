import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import type { ChallengeMode } from "@runfund/types";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "challenges", versionKey: false })
export class ChallengeEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare ownerId: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 100 })
  declare name: string;

  @Prop({ type: String, default: "" })
  declare description: string;

  @Prop({ type: String, enum: ["Free", "Paid"], required: true, default: "Free" })
  declare mode: ChallengeMode;

  @Prop({ type: String, default: "" })
  declare condition: string;

  @Prop({ type: String, default: "" })
  declare goal: string;

  @Prop({ type: String, default: "" })
  declare location: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare distanceToCover: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare targetAmount: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare targetAmountPerKm: number;

  @Prop({ type: String, default: "" })
  declare startDuration: string;

  @Prop({ type: String, default: "" })
  declare endDuration: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare noOfWinner: number;

  @Prop({ type: [Number], default: [] })
  declare winningPrice: number[];

  @Prop({ type: [Number], default: [] })
  declare causePrice: number[];

  @Prop({ type: String, default: "" })
  declare coverImage: string;

  @Prop({ type: String, default: "" })
  declare videoUrl: string;

  @Prop({ type: String, required: true, unique: true })
  declare slug: string;

  @Prop({ type: [String], default: [] })
  declare members: string[];

  @Prop({ type: SchemaTypes.Date, required: true, index: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const ChallengeSchema = SchemaFactory.createForClass(ChallengeEntity);
