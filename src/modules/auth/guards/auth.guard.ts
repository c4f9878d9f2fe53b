import {
    Injectable,
    CanActivate,
    ExecutionContext,
} from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { AuthService } from '../auth.service';
import { AuthContext } from '../interfaces/auth.interfaces';

// Extend FastifyRequest with the resolved backend credential
declare module 'fastify' {
    interface FastifyRequest {
        authContext?: AuthContext;
    }
}

@Injectable()
export class AuthGuard implements CanActivate {
    constructor(private readonly authService: AuthService) { }

    async canActivate(context: ExecutionContext): Promise<boolean> {
        const request = context.switchToHttp().getRequest<FastifyRequest>();

        // Attach auth context to request for downstream use
        request.authContext = await this.authService.authenticate(request);

        return true;
    }
}
