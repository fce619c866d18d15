import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Patch, Post, Query } from "@nestjs/common";
import {
  registerProfileInputSchema,
  setFlagInputSchema,
  updateProfileInputSchema,
  userListQuerySchema,
  type AuthUser,
  type Page,
  type PublicUser,
  type UserProfile,
  type UserStats
} from "@runfund/types";
import { AllowAnonymous, CurrentUser, StaffOnly } from "../auth/auth.decorators";
import { parseInput } from "../common/validation";
import { UserService } from "./user.service";
import { toPublicUser, toUserProfile } from "./user.views";

@Controller("api/users")
export class UsersController {
  constructor(@Inject(UserService) private readonly userService: UserService) {}

  @Post("me")
  @HttpCode(201)
  async register(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<UserProfile> {
    const input = parseInput(registerProfileInputSchema, body);
    return toUserProfile(await this.userService.registerProfile(caller.id, input));
  }

  @Get("me")
  async getMe(@CurrentUser() caller: AuthUser): Promise<UserProfile> {
    return toUserProfile(await this.userService.getOwnProfile(caller.id));
  }

  @Patch("me")
  async updateMe(@CurrentUser() caller: AuthUser, @Body() body: unknown): Promise<UserProfile> {
    const input = parseInput(updateProfileInputSchema, body);
    return toUserProfile(await this.userService.updateProfile(caller.id, input));
  }

  @Delete("me")
  @HttpCode(204)
  async deleteMe(@CurrentUser() caller: AuthUser): Promise<void> {
    await this.userService.deleteAccount(caller.id);
  }

  @Get()
  @StaffOnly()
  async list(@Query() query: unknown): Promise<Page<UserProfile>> {
    const page = await this.userService.listUsers(parseInput(userListQuerySchema, query));
    return { ...page, items: page.items.map(toUserProfile) };
  }

  @Get("stats")
  @StaffOnly()
  stats(): Promise<UserStats> {
    return this.userService.getUserStats();
  }

  @Get("username/:username")
  @AllowAnonymous()
  async getByUsername(@Param("username") username: string): Promise<PublicUser> {
    return toPublicUser(await this.userService.getUserByUsername(username));
  }

  @Get(":id")
  @AllowAnonymous()
  async getById(@Param("id") id: string): Promise<PublicUser> {
    return toPublicUser(await this.userService.getUserById(id));
  }

  @Patch(":id/active")
  @StaffOnly()
  async setActive(@Param("id") id: string, @Body() body: unknown): Promise<UserProfile> {
    const { value } = parseInput(setFlagInputSchema, body);
    return toUserProfile(await this.userService.setActive(id, value));
  }

  @Patch(":id/staff")
  @StaffOnly()
  async setStaff(@Param("id") id: string, @Body() body: unknown): Promise<UserProfile> {
    const { value } = parseInput(setFlagInputSchema, body);
    return toUserProfile(await this.userService.setStaff(id, value));
  }

  @Post(":id/verify")
  @HttpCode(200)
  @StaffOnly()
  async verify(@Param("id") id: string): Promise<UserProfile> {
    return toUserProfile(await this.userService.markVerified(id));
  }
}
