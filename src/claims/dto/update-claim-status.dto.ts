import { IsDefined } from 'class-validator';

export class UpdateClaimStatusDto {
  // a status name or numeric code; the registry rejects anything else as InvalidStatus
  @IsDefined()
  readonly status!: string | number;
}

export class StatusChangeResponseDto {
  readonly claimId!: number;
  readonly oldStatus!: string;
  readonly newStatus!: string;
}
