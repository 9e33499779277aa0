import { IsString, IsNumberString } from 'class-validator';

export class CreateClaimDto {
  @IsString()
  readonly customerId!: string;

  // decimal digits only; amounts go up to 2^256 - 1
  @IsNumberString({ no_symbols: true })
  readonly amount!: string;
}

export class CreateClaimResponseDto {
  readonly claimId!: number;
}
