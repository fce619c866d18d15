import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "users", versionKey: false })
export class UserEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, unique: true, lowercase: true, trim: true })
  declare username: string;

  @Prop({ type: String, required: true, unique: true, lowercase: true, trim: true })
  declare email: string;

  @Prop({ type: String, default: "" })
  declare firstName: string;

  @Prop({ type: String, default: "" })
  declare lastName: string;

  @Prop({ type: Number, default: 0, min: 0 })
  declare height: number;

  @Prop({ type: Number, default: 0, min: 0 })
  declare weight: number;

  @Prop({ type: String, default: "" })
  declare profileImageUrl: string;

  @Prop({ type: Boolean, default: false, index: true })
  declare isStaff: boolean;

  @Prop({ type: Boolean, default: true })
  declare isActive: boolean;

  @Prop({ type: Boolean, default: false })
  declare isVerified: boolean;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare dateJoined: Date;

  @Prop({ type: SchemaTypes.Date, default: null })
  declare lastLogin: Date | null;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const UserSchema = SchemaFactory.createForClass(UserEntity);
