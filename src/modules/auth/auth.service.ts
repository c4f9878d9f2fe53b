import { Injectable, Logger } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { CredentialService } from './credential.service';
import { AuthContext } from './interfaces/auth.interfaces';
import { extractCallerToken } from './token.extractor';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(private readonly credentials: CredentialService) {}

  /**
   * Resolve the backend credential a request runs with.
   */
  async authenticate(request: FastifyRequest): Promise<AuthContext> {
    if (this.credentials.hasOperatorToken) {
      return { credential: this.credentials.current(), source: 'operator' };
    }

    const callerToken = extractCallerToken(request.headers);
    if (!callerToken) {
      this.logger.debug(`No usable account token on ${request.method} ${request.url}`);
    }
    const credential = await this.credentials.resolve(callerToken);
    return { credential, source: 'caller' };
  }
}
