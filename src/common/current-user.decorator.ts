import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';

export const USER_ID_HEADER = 'x-user-id';

export function parseUserId(header: string | string[] | undefined): number {
    const raw = Array.isArray(header) ? header[0] : header;
    const userId = Number(raw);
    if (!raw || !Number.isInteger(userId) || userId <= 0) {
        throw new UnauthorizedException('Missing or invalid user identity');
    }
    return userId;
}

/**
 * Id of the acting user. Authentication happens at the gateway, which forwards
 * the verified id in the `x-user-id` header.
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): number => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return parseUserId(request.headers[USER_ID_HEADER]);
});
