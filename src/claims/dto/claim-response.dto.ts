import { Claim, statusName } from '../domain/claim';

export class ClaimResponseDto {
  readonly claimId!: number;
  readonly customerIdHash!: string;
  readonly amount!: string;
  readonly claimDate!: number;
  readonly status!: string;

  static fromClaim(claim: Claim): ClaimResponseDto {
    return {
      claimId: claim.claimId,
      customerIdHash: claim.customerIdHash,
      amount: claim.amount.toString(),
      claimDate: claim.claimDate,
      status: statusName(claim.status)
    };
  }
}
