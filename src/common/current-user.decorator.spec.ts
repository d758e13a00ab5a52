import { UnauthorizedException } from '@nestjs/common';
import { parseUserId } from './current-user.decorator';

describe('parseUserId', () => {
    it('reads a positive integer id', () => {
        expect(parseUserId('42')).toBe(42);
        expect(parseUserId(['7', '8'])).toBe(7);
    });

    it.each([undefined, '', 'abc', '0', '-3', '1.5'])('rejects %p', (header) => {
        expect(() => parseUserId(header)).toThrow(UnauthorizedException);
    });
});
