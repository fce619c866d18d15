import { CanActivate, ExecutionContext, ForbiddenException, Inject, Injectable, UnauthorizedException } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { createRequestLogger } from "../observability/logger";
import { AuthAuditService } from "./auth-audit.service";
import { resolveAuthUser } from "./auth-context";
import { ALLOW_ANONYMOUS_KEY, STAFF_ONLY_KEY } from "./auth.decorators";
import type { AuthenticatedRequest } from "./auth.types";

/**
 * Global guard. Every route needs a forwarded user unless it is marked
 * `@AllowAnonymous()`; `@StaffOnly()` routes additionally need `isStaff`.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    @Inject(Reflector) private readonly reflector: Reflector,
    @Inject(AuthAuditService) private readonly audit: AuthAuditService
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const requestId = String(request.id);
    const logger = createRequestLogger(requestId);
    const targets = [context.getHandler(), context.getClass()];

    const user = resolveAuthUser(request.headers, logger);
    request.authUser = user;

    if (this.reflector.getAllAndOverride<boolean | undefined>(ALLOW_ANONYMOUS_KEY, targets)) {
      return true;
    }

    const operation = `${context.getClass().name}.${context.getHandler().name}`;

    if (!user) {
      this.audit.recordAuthorizationFailure({
        requestId,
        operation,
        reason: "missing_user",
        logger,
        ipAddress: request.ip
      });
      throw new UnauthorizedException("Authentication is required to access this resource.");
    }

    if (this.reflector.getAllAndOverride<boolean | undefined>(STAFF_ONLY_KEY, targets) && !user.isStaff) {
      this.audit.recordAuthorizationFailure({
        requestId,
        operation,
        reason: "staff_required",
        logger,
        userId: user.id,
        ipAddress: request.ip
      });
      throw new ForbiddenException("You do not have permission to perform this action.");
    }

    return true;
  }
}
