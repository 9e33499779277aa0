import { IsString } from 'class-validator';

export class CustomerLookupDto {
  @IsString()
  readonly customerId!: string;
}

export class OwnershipCheckResponseDto {
  readonly claimId!: number;
  readonly owned!: boolean;
}
