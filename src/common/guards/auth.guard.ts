import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { GameConfigService } from '../../config/game-config.service.js';
import { UnauthorizedError } from '../errors/game-errors.js';

export type AuthenticatedRequest = Request & { userId?: string };

@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private readonly jwtService: JwtService,
    private readonly config: GameConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();

    // 1. Bearer token 확인
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: { sub?: unknown };
      try {
        payload = this.jwtService.verify<{ sub?: unknown }>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new UnauthorizedError('Token has no subject');
      }
      req.userId = payload.sub;
      return true;
    }

    // 2. Dev fallback: x-user-id (non-production only)
    if (!this.config.get().production) {
      const userId = req.headers['x-user-id'];
      if (userId && typeof userId === 'string') {
        req.userId = userId;
        return true;
      }
    }

    throw new UnauthorizedError(
      'Authorization header with Bearer token is required',
    );
  }
}
