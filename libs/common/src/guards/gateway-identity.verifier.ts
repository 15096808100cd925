import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { IncomingHttpHeaders } from 'http';
import { isUserRole } from '../enums/user-role.enum';
import { AuthenticatedUser } from '../interfaces/authenticated-user.interface';

const SIGNATURE_MAX_AGE_MS = 5 * 60 * 1000;

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolves the caller identity from the headers the API gateway attaches after
 * authenticating a request. Shared by the HTTP guard and the websocket handshake.
 */
@Injectable()
export class GatewayIdentityVerifier {
  private readonly logger = new Logger(GatewayIdentityVerifier.name);
  private readonly gatewaySecret: string;

  constructor(private readonly configService: ConfigService) {
    this.gatewaySecret = this.configService.get<string>('GATEWAY_SECRET_KEY') ?? '';
    if (!this.gatewaySecret) {
      this.logger.warn('GATEWAY_SECRET_KEY not set, gateway signatures will not be verified');
    }
  }

  resolve(headers: IncomingHttpHeaders, now: number = Date.now()): AuthenticatedUser {
    if (headerValue(headers, 'x-auth-verified') !== 'true' || headerValue(headers, 'x-auth-verified-by') !== 'api-gateway') {
      throw new UnauthorizedException('Request not authenticated by API Gateway');
    }

    const userId = headerValue(headers, 'x-user-id');
    if (!userId) {
      throw new UnauthorizedException('Missing user identity');
    }

    if (this.gatewaySecret) {
      try {
        this.verifySignature(headers, userId, now);
      } catch (error) {
        this.logger.warn(`Signature verification failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
        throw new UnauthorizedException('Invalid authentication signature');
      }
    }

    const role = this.parseRoles(headerValue(headers, 'x-user-roles')).find(isUserRole);
    if (!role) {
      throw new UnauthorizedException('Missing or unknown user role');
    }

    return { userId, role };
  }

  private parseRoles(raw: string | undefined): unknown[] {
    if (!raw) {
      return [];
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return Array.isArray(parsed) ? parsed : [parsed];
    } catch {
      this.logger.warn('Failed to parse user roles from header');
      return [];
    }
  }

  /**
   * HMAC over the base64-decoded signature data; the data must name the same
   * user and be younger than five minutes.
   */
  private verifySignature(headers: IncomingHttpHeaders, userId: string, now: number): void {
    const signature = headerValue(headers, 'x-auth-signature');
    const signatureDataBase64 = headerValue(headers, 'x-auth-signature-data');

    if (!signature || !signatureDataBase64) {
      throw new Error('Authentication signature missing');
    }

    const signatureDataJson = Buffer.from(signatureDataBase64, 'base64').toString();
    const signatureData: unknown = JSON.parse(signatureDataJson);
    if (typeof signatureData !== 'object' || signatureData === null) {
      throw new Error('Malformed signature data');
    }

    const timestamp: unknown = Reflect.get(signatureData, 'timestamp');
    if (typeof timestamp !== 'number' || now - timestamp > SIGNATURE_MAX_AGE_MS) {
      throw new Error('Authentication signature expired');
    }
    if (Reflect.get(signatureData, 'userId') !== userId) {
      throw new Error('Signature issued for another user');
    }

    const expected = crypto.createHmac('sha256', this.gatewaySecret).update(signatureDataJson).digest('hex');
    const expectedBuffer = Buffer.from(expected);
    const signatureBuffer = Buffer.from(signature);
    if (expectedBuffer.length !== signatureBuffer.length || !crypto.timingSafeEqual(expectedBuffer, signatureBuffer)) {
      throw new Error('Invalid signature');
    }
  }
}
