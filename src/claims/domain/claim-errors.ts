import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';

export type ClaimErrorCode =
  | 'InvalidAmount'
  | 'InvalidStatus'
  | 'InvalidOwner'
  | 'ClaimNotFound'
  | 'StatusAlreadySet'
  | 'Unauthorized';

export class InvalidAmountError extends BadRequestException {
  readonly code: ClaimErrorCode = 'InvalidAmount';

  constructor(amount: string) {
    super(`Claim amount must be a positive 256-bit integer, got ${amount}`, 'InvalidAmount');
  }
}

export class InvalidStatusError extends BadRequestException {
  readonly code: ClaimErrorCode = 'InvalidStatus';

  constructor(status: unknown) {
    super(`Unknown claim status ${String(status)}`, 'InvalidStatus');
  }
}

export class InvalidOwnerError extends BadRequestException {
  readonly code: ClaimErrorCode = 'InvalidOwner';

  constructor() {
    super('New owner must be a non-empty identity', 'InvalidOwner');
  }
}

export class ClaimNotFoundError extends NotFoundException {
  readonly code: ClaimErrorCode = 'ClaimNotFound';

  constructor(claimId: number) {
    super(`Claim ${claimId} not found`, 'ClaimNotFound');
  }
}

/** Also raised for any transition out of a terminal status. */
export class StatusAlreadySetError extends ConflictException {
  readonly code: ClaimErrorCode = 'StatusAlreadySet';

  constructor(claimId: number, current: string) {
    super(`Claim ${claimId} status is already ${current}`, 'StatusAlreadySet');
  }
}

export class UnauthorizedCallerError extends ForbiddenException {
  readonly code: ClaimErrorCode = 'Unauthorized';

  constructor(caller: string) {
    super(`Caller ${caller} is not the registry owner`, 'Unauthorized');
  }
}
