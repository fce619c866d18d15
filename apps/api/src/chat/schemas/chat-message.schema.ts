import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import { SchemaTypes } from "mongoose";

@Schema({ collection: "chat_messages", versionKey: false })
export class ChatMessageEntity {
  @Prop({ type: String, required: true })
  declare _id: string;

  @Prop({ type: String, required: true })
  declare groupId: string;

  @Prop({ type: String, required: true, index: true })
  declare senderId: string;

  @Prop({ type: String, required: true, maxlength: 2000 })
  declare content: string;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare createdAt: Date;

  @Prop({ type: SchemaTypes.Date, required: true })
  declare updatedAt: Date;
}

export const ChatMessageSchema = SchemaFactory.createForClass(ChatMessageEntity);

ChatMessageSchema.index({ groupId: 1, createdAt: -1 });
ChatMessageSchema.index({ groupId: 1, senderId: 1, createdAt: -1 });
