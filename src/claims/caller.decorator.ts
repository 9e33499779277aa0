import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import { Request } from 'express';

export const CALLER_HEADER = 'x-caller-id';

/** Resolves the calling identity from the x-caller-id header. */
export const Caller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const caller = request.header(CALLER_HEADER)?.trim();
  if (!caller) {
    throw new UnauthorizedException(`Missing ${CALLER_HEADER} header`, 'MissingCaller');
  }
  return caller;
});
