// libs/common/test/unit/guards/trusted-gateway.guard.spec.ts
import { Public } from '@app/common/decorators/public.decorator';
import { Roles } from '@app/common/decorators/roles.decorator';
import { UserRole } from '@app/common/enums/user-role.enum';
import { NotAuthorizedException } from '@app/common/exceptions/dispatch.exception';
import { GatewayIdentityVerifier } from '@app/common/guards/gateway-identity.verifier';
import { TrustedGatewayGuard } from '@app/common/guards/trusted-gateway.guard';
import { AuthenticatedUser } from '@app/common/interfaces/authenticated-user.interface';
import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { IncomingHttpHeaders } from 'http';

class SampleController {
  @Public()
  open(): void {}

  @Roles(UserRole.ADMIN)
  adminOnly(): void {}

  anyUser(): void {}
}

interface SampleRequest {
  headers: IncomingHttpHeaders;
  user?: AuthenticatedUser;
}

const gatewayHeaders = (userId: string, role: UserRole): IncomingHttpHeaders => ({
  'x-auth-verified': 'true',
  'x-auth-verified-by': 'api-gateway',
  'x-user-id': userId,
  'x-user-roles': JSON.stringify([role]),
});

const contextFor = (request: SampleRequest, handler: () => void) =>
  new ExecutionContextHost([request], SampleController, handler);

describe('TrustedGatewayGuard', () => {
  let guard: TrustedGatewayGuard;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TrustedGatewayGuard,
        GatewayIdentityVerifier,
        Reflector,
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
      ],
    }).compile();

    guard = module.get<TrustedGatewayGuard>(TrustedGatewayGuard);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('canActivate', () => {
    it('should let public handlers through without identity headers', () => {
      // Arrange
      const request: SampleRequest = { headers: {} };

      // Act
      const result = guard.canActivate(contextFor(request, SampleController.prototype.open));

      // Assert
      expect(result).toBe(true);
      expect(request.user).toBeUndefined();
    });

    it('should attach the resolved user to the request', () => {
      // Arrange
      const request: SampleRequest = { headers: gatewayHeaders('customer-123', UserRole.CUSTOMER) };

      // Act
      const result = guard.canActivate(contextFor(request, SampleController.prototype.anyUser));

      // Assert
      expect(result).toBe(true);
      expect(request.user).toEqual({ userId: 'customer-123', role: UserRole.CUSTOMER });
    });

    it('should allow a caller holding the required role', () => {
      // Arrange
      const request: SampleRequest = { headers: gatewayHeaders('admin-1', UserRole.ADMIN) };

      // Act
      const result = guard.canActivate(contextFor(request, SampleController.prototype.adminOnly));

      // Assert
      expect(result).toBe(true);
    });

    it('should refuse a caller without the required role', () => {
      // Arrange
      const request: SampleRequest = { headers: gatewayHeaders('driver-123', UserRole.DRIVER) };

      // Act & Assert
      expect(() => guard.canActivate(contextFor(request, SampleController.prototype.adminOnly))).toThrow(
        NotAuthorizedException,
      );
      expect(request.user).toBeUndefined();
    });

    it('should reject unauthenticated callers on protected handlers', () => {
      // Arrange
      const request: SampleRequest = { headers: {} };

      // Act & Assert
      expect(() => guard.canActivate(contextFor(request, SampleController.prototype.anyUser))).toThrow(
        UnauthorizedException,
      );
    });
  });
});
