import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ClaimsService } from './claims.service';
import { Caller } from './caller.decorator';
import { OwnerResponseDto, TransferOwnershipDto } from './dto/transfer-ownership.dto';

@Controller('registry')
export class RegistryController {
  constructor(private readonly claims: ClaimsService) {}

  @Get('owner')
  async owner(): Promise<OwnerResponseDto> {
    return { owner: await this.claims.owner() };
  }

  @Post('owner/transfer')
  @HttpCode(200)
  async transferOwnership(@Caller() caller: string, @Body() body: TransferOwnershipDto): Promise<OwnerResponseDto> {
    await this.claims.transferOwnership(body.newOwner, caller);
    return { owner: body.newOwner };
  }

  @Post('owner/renounce')
  @HttpCode(200)
  async renounceOwnership(@Caller() caller: string): Promise<OwnerResponseDto> {
    await this.claims.renounceOwnership(caller);
    return { owner: null };
  }
}
