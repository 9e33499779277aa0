import { Claim, statusName } from './claim';

export interface SerializedClaim {
  claimId: string;
  customerIdHash: string;
  amount: string;
  claimDate: string;
  status: string;
}

// Key order is part of the output format.
export function toSerializedClaim(claim: Claim): SerializedClaim {
  return {
    claimId: claim.claimId.toString(),
    customerIdHash: claim.customerIdHash.toLowerCase(),
    amount: claim.amount.toString(),
    claimDate: claim.claimDate.toString(),
    status: statusName(claim.status)
  };
}

export function serializeClaim(claim: Claim): string {
  return JSON.stringify(toSerializedClaim(claim));
}

export function serializeClaims(claims: Claim[]): string {
  return JSON.stringify(claims.map(toSerializedClaim));
}
