import { globToRegExp, InMemoryCacheClient } from './in-memory-cache.client';

describe('InMemoryCacheClient', () => {
    let now: number;
    let cache: InMemoryCacheClient;

    beforeEach(() => {
        now = Date.UTC(2024, 0, 1);
        cache = new InMemoryCacheClient(() => now);
    });

    it('returns a stored value until its ttl elapses', async () => {
        await cache.set('answered_quiz_1_2_3', '{"a":1}', 60);

        now += 59_999;
        expect(await cache.get('answered_quiz_1_2_3')).toBe('{"a":1}');

        now += 1;
        expect(await cache.get('answered_quiz_1_2_3')).toBeNull();
    });

    it('restarts the ttl when a key is written again', async () => {
        await cache.set('k', 'first', 10);
        now += 9_000;
        await cache.set('k', 'second', 10);
        now += 9_000;

        expect(await cache.get('k')).toBe('second');
    });

    it('scans keys by glob and skips expired entries', async () => {
        await cache.set('answered_quiz_1_2_3', 'x', 100);
        await cache.set('answered_quiz_1_2_4', 'y', 10);
        await cache.set('answered_quiz_11_2_3', 'z', 100);
        now += 10_000;

        expect(await cache.scan('answered_quiz_1_2_*')).toEqual(['answered_quiz_1_2_3']);
        expect((await cache.scan('answered_quiz_*_2_3')).sort()).toEqual(['answered_quiz_11_2_3', 'answered_quiz_1_2_3']);
    });

    it('treats regex characters in patterns literally', () => {
        expect(globToRegExp('a.b*').test('a.bcd')).toBe(true);
        expect(globToRegExp('a.b*').test('axbcd')).toBe(false);
        expect(globToRegExp('k?').test('k1')).toBe(true);
        expect(globToRegExp('k?').test('k12')).toBe(false);
    });
});
