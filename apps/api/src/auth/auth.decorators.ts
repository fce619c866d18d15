import { createParamDecorator, ExecutionContext, SetMetadata, UnauthorizedException } from "@nestjs/common";
import type { AuthUser } from "@runfund/types";
import type { AuthenticatedRequest } from "./auth.types";

export const ALLOW_ANONYMOUS_KEY = Symbol("allow_anonymous");
export const STAFF_ONLY_KEY = Symbol("staff_only");

export const AllowAnonymous = () => SetMetadata(ALLOW_ANONYMOUS_KEY, true);
export const StaffOnly = () => SetMetadata(STAFF_ONLY_KEY, true);

export const currentUserFactory = (_data: unknown, context: ExecutionContext): AuthUser => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

  if (!request.authUser) {
    throw new UnauthorizedException("Authentication is required to access this resource.");
  }

  return request.authUser;
};

export const CurrentUser = createParamDecorator(currentUserFactory);
