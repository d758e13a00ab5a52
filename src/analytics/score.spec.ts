import { averageScore } from './score';

describe('averageScore', () => {
    it('is 0 without records', () => {
        expect(averageScore([])).toBe(0);
    });

    it('rounds to two decimals', () => {
        expect(averageScore([{ isCorrect: true }, { isCorrect: false }, { isCorrect: true }])).toBe(0.67);
        expect(averageScore([{ isCorrect: true }, { isCorrect: false }, { isCorrect: false }])).toBe(0.33);
    });

    it('is 1 when every answer is correct', () => {
        expect(averageScore([{ isCorrect: true }, { isCorrect: true }])).toBe(1);
    });
});
