import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { UsersModule } from "../users/users.module";
import { ChatController } from "./chat.controller";
import { CHAT_GROUP_REPOSITORY, CHAT_MESSAGE_REPOSITORY } from "./chat.repositories";
import { ChatService } from "./chat.service";
import { MongoChatGroupRepository } from "./repositories/mongo-chat-group.repository";
import { MongoChatMessageRepository } from "./repositories/mongo-chat-message.repository";
import { ChatGroupEntity, ChatGroupSchema } from "./schemas/chat-group.schema";
import { ChatMessageEntity, ChatMessageSchema } from "./schemas/chat-message.schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ChatGroupEntity.name, schema: ChatGroupSchema },
      { name: ChatMessageEntity.name, schema: ChatMessageSchema }
    ]),
    UsersModule
  ],
  controllers: [ChatController],
  providers: [
    { provide: CHAT_GROUP_REPOSITORY, useClass: MongoChatGroupRepository },
    { provide: CHAT_MESSAGE_REPOSITORY, useClass: MongoChatMessageRepository },
    ChatService
  ]
})
export class ChatModule {}
