import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import type { Activity } from "@runfund/types";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "causes", versionKey: false })
export class CauseEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, index: true })
  declare challengeId: string;

  @Prop({ type: String, required: true, index: true })
  declare ownerId: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 100 })
  declare name: string;

  @Prop({ type: String, default: "" })
  declare problem: string;

  @Prop({ type: String, default: "" })
  declare solution: string;

  @Prop({ type: String, default: "" })
  declare productDescription: string;

  @Prop({ type: String, enum: ["Walking", "Running", "Cycling"], required: true })
  declare activity: Activity;

  @Prop({ type: String, default: "" })
  declare location: string;

  @Prop({ type: String, default: "" })
  declare description: string;

  @Prop({ type: Boolean, default: false })
  declare isCommercial: boolean;

  @Prop({ type: String, default: "" })
  declare whoIdeaImpact: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare distanceCovered: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare amountPerPiece: number;

  @Prop({ type: String, default: "" })
  declare duration: string;

  @Prop({ type: Boolean, default: false })
  declare fundCause: boolean;

  @Prop({ type: Number, default: 0, min: 0 })
  declare fundAmount: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare willingAmount: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare unitPrice: number;

  @Prop({ type: String, default: "" })
  declare costToLaunch: string;

  @Prop({ type: String, default: "" })
  declare benefitDesc: string;

  @Prop({ type: String, default: "" })
  declare workoutImg: string;

  @Prop({ type: String, default: "" })
  declare videoUrl: string;

  @Prop({ type: String, required: true, unique: true })
  declare slug: string;

  @Prop({ type: [String], default: [] })
  declare members: string[];

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const CauseSchema = SchemaFactory.createForClass(CauseEntity);
