import { CanActivate, ExecutionContext, Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import jwt, { Algorithm, GetPublicKeyOrSecret, JwtPayload } from 'jsonwebtoken';
import jwksClient, { JwksClient } from 'jwks-rsa';
import { GatewayRequest, VerifiedIdentity } from '../../lib';
import { IDENTITY_CONFIG, IdentityConfig } from './identity.config';
import { IS_PUBLIC_KEY } from './Public';

const BEARER_PREFIX = 'Bearer ';

function authenticationRequired(): UnauthorizedException {
  return new UnauthorizedException({ message: 'Authentication required', code: 'AUTHENTICATION_FAILED' });
}

/**
 * Verifies the bearer token of every non-public route and places its claims
 * on `request.user`, where the enforcement layer picks them up.
 */
@Injectable()
export class JwtIdentityGuard implements CanActivate {
  private readonly logger = new Logger(JwtIdentityGuard.name);
  private readonly jwks?: JwksClient;

  constructor(
    private readonly reflector: Reflector,
    @Inject(IDENTITY_CONFIG) private readonly config: IdentityConfig,
  ) {
    if (config.secret === undefined && config.jwksUri !== undefined) {
      this.jwks = jwksClient({ jwksUri: config.jwksUri, cache: true, rateLimit: true, jwksRequestsPerMinute: 10 });
    }
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') return true;

    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<GatewayRequest>();
    const header = request.headers?.authorization;
    if (typeof header !== 'string' || !header.startsWith(BEARER_PREFIX)) {
      throw authenticationRequired();
    }

    try {
      request.user = await this.verify(header.substring(BEARER_PREFIX.length));
    } catch (error) {
      this.logger.warn(`Rejected bearer token: ${error instanceof Error ? error.message : String(error)}`);
      throw authenticationRequired();
    }
    return true;
  }

  private verify(token: string): Promise<VerifiedIdentity> {
    const algorithms: Algorithm[] = this.config.secret !== undefined ? ['HS256'] : ['RS256'];
    const key = this.config.secret ?? this.signingKey;

    return new Promise((resolve, reject) => {
      jwt.verify(
        token,
        key,
        { algorithms, issuer: this.config.issuer, audience: this.config.audience },
        (error, decoded) => {
          if (error) {
            reject(error);
          } else if (decoded === undefined || typeof decoded === 'string') {
            reject(new Error('token payload is not a claim set'));
          } else {
            resolve(toIdentity(decoded));
          }
        },
      );
    });
  }

  private readonly signingKey: GetPublicKeyOrSecret = (header, callback) => {
    if (!this.jwks) {
      callback(new Error('no key source configured'));
      return;
    }
    this.jwks.getSigningKey(header.kid, (error, key) => {
      if (error || !key) {
        callback(error ?? new Error(`signing key ${header.kid} not found`));
      } else {
        callback(null, key.getPublicKey());
      }
    });
  };
}

function toIdentity(payload: JwtPayload): VerifiedIdentity {
  return { ...payload };
}
