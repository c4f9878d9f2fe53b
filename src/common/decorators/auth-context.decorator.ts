import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { Credential } from '../../modules/auth/interfaces/auth.interfaces';

/**
 * Backend credential resolved by AuthGuard.
 * Usage: @BackendCredential() credential: Credential
 */
export const BackendCredential = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Credential => {
    const request = ctx.switchToHttp().getRequest<FastifyRequest>();

    if (!request.authContext) {
      throw new Error('AuthContext not found on request. Is AuthGuard applied?');
    }

    return request.authContext.credential;
  },
);
