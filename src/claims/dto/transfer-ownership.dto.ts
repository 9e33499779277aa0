import { IsString } from 'class-validator';

export class TransferOwnershipDto {
  @IsString()
  readonly newOwner!: string;
}

export class OwnerResponseDto {
  readonly owner!: string | null;
}
