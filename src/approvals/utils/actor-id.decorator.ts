import {
  BadRequestException,
  createParamDecorator,
  ExecutionContext,
} from '@nestjs/common';
import { Request } from 'express';

export const ACTOR_ID_HEADER = 'x-actor-id';

/**
 * Extract the caller's user id from the request
 *
 * Authentication happens upstream; this service trusts the header as the
 * already-verified actor identity.
 */
export function extractActorId(req: Pick<Request, 'headers'>): string {
  const header = req.headers[ACTOR_ID_HEADER];
  const actorId = (Array.isArray(header) ? header[0] : header)?.trim();

  if (!actorId) {
    throw new BadRequestException(`Missing ${ACTOR_ID_HEADER} header`);
  }
  return actorId;
}

export const ActorId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string =>
    extractActorId(ctx.switchToHttp().getRequest<Request>()),
);
