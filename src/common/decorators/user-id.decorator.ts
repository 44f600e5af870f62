import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import { UnauthorizedError } from '../errors/game-errors.js';
import type { AuthenticatedRequest } from '../guards/auth.guard.js';

export const UserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!req.userId) {
      throw new UnauthorizedError('Missing authenticated user');
    }
    return req.userId;
  },
);
