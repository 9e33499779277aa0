import { Body, Controller, Get, Header, HttpCode, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ClaimsService } from './claims.service';
import { Caller } from './caller.decorator';
import { statusName } from './domain/claim';
import { ClaimResponseDto } from './dto/claim-response.dto';
import { CreateClaimDto, CreateClaimResponseDto } from './dto/create-claim.dto';
import { StatusChangeResponseDto, UpdateClaimStatusDto } from './dto/update-claim-status.dto';
import { CustomerLookupDto, OwnershipCheckResponseDto } from './dto/customer-lookup.dto';

@Controller('claims')
export class ClaimsController {
  constructor(private readonly claims: ClaimsService) {}

  @Get('health')
  health() {
    return { status: 'ok' };
  }

  @Post()
  async submitClaim(@Caller() caller: string, @Body() body: CreateClaimDto): Promise<CreateClaimResponseDto> {
    const claimId = await this.claims.submitClaim(body.customerId, BigInt(body.amount), caller);
    return { claimId };
  }

  @Post('by-customer')
  @HttpCode(200)
  @Header('Content-Type', 'application/json')
  async listCustomerClaims(@Body() body: CustomerLookupDto): Promise<string> {
    return this.claims.listCustomerClaimsAsText(body.customerId);
  }

  @Get(':claimId')
  async getClaim(@Param('claimId', ParseIntPipe) claimId: number): Promise<ClaimResponseDto> {
    return ClaimResponseDto.fromClaim(await this.claims.getClaim(claimId));
  }

  @Get(':claimId/text')
  @Header('Content-Type', 'application/json')
  async serializeClaim(@Param('claimId', ParseIntPipe) claimId: number): Promise<string> {
    return this.claims.serializeClaim(claimId);
  }

  @Patch(':claimId/status')
  async updateStatus(
    @Caller() caller: string,
    @Param('claimId', ParseIntPipe) claimId: number,
    @Body() body: UpdateClaimStatusDto
  ): Promise<StatusChangeResponseDto> {
    const change = await this.claims.updateClaimStatus(claimId, body.status, caller);
    return {
      claimId: change.claimId,
      oldStatus: statusName(change.oldStatus),
      newStatus: statusName(change.newStatus)
    };
  }

  @Post(':claimId/verify-ownership')
  @HttpCode(200)
  async verifyOwnership(
    @Param('claimId', ParseIntPipe) claimId: number,
    @Body() body: CustomerLookupDto
  ): Promise<OwnershipCheckResponseDto> {
    const owned = await this.claims.verifyClaimOwnership(claimId, body.customerId);
    return { claimId, owned };
  }
}
