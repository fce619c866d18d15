import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "chat_groups", versionKey: false })
export class ChatGroupEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true, trim: true, maxlength: 20 })
  declare name: string;

  @Prop({ type: String, required: true, unique: true })
  declare slug: string;

  @Prop({ type: String, default: "" })
  declare description: string;

  @Prop({ type: String, default: "" })
  declare image: string;

  @Prop({ type: String, required: true })
  declare creatorId: string;

  @Prop({ type: [String], default: [], index: true })
  declare members: string[];

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const ChatGroupSchema = SchemaFactory.createForClass(ChatGroupEntity);
