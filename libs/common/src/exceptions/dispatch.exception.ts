import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

export enum DispatchErrorCode {
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  NOT_FOUND = 'NOT_FOUND',
  NOT_AUTHORIZED = 'NOT_AUTHORIZED',
  ORDER_NOT_AVAILABLE = 'ORDER_NOT_AVAILABLE',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  UPSTREAM_UNAVAILABLE = 'UPSTREAM_UNAVAILABLE',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

export interface DispatchErrorBody {
  code: DispatchErrorCode;
  message: string;
}

export class OrderNotFoundException extends NotFoundException {
  constructor(orderId: string, message = `Order ${orderId} not found`) {
    super({ code: DispatchErrorCode.ORDER_NOT_FOUND, message });
  }
}

export class ResourceNotFoundException extends NotFoundException {
  constructor(message: string) {
    super({ code: DispatchErrorCode.NOT_FOUND, message });
  }
}

export class NotAuthorizedException extends ForbiddenException {
  constructor(message = 'You are not authorized to perform this action') {
    super({ code: DispatchErrorCode.NOT_AUTHORIZED, message });
  }
}

export class OrderNotAvailableException extends ConflictException {
  constructor(orderId: string) {
    super({
      code: DispatchErrorCode.ORDER_NOT_AVAILABLE,
      message: `Order ${orderId} is no longer available`,
    });
  }
}

export class InvalidTransitionException extends ConflictException {
  constructor(message: string) {
    super({ code: DispatchErrorCode.INVALID_TRANSITION, message });
  }
}

export class InsufficientBalanceException extends HttpException {
  constructor(message = 'Insufficient wallet balance, please top up your wallet') {
    super({ code: DispatchErrorCode.INSUFFICIENT_BALANCE, message }, HttpStatus.PAYMENT_REQUIRED);
  }
}

export class UpstreamUnavailableException extends ServiceUnavailableException {
  constructor(message: string) {
    super({ code: DispatchErrorCode.UPSTREAM_UNAVAILABLE, message });
  }
}

export class DomainValidationException extends BadRequestException {
  constructor(message: string) {
    super({ code: DispatchErrorCode.VALIDATION_ERROR, message });
  }
}

export function isDispatchErrorBody(value: unknown): value is DispatchErrorBody {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const code: unknown = Reflect.get(value, 'code');
  return typeof code === 'string' && Object.values<string>(DispatchErrorCode).includes(code);
}
