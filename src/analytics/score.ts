/** Share of correct answers rounded to two decimals, 0 when there are none. */
export function averageScore(records: ReadonlyArray<{ isCorrect: boolean }>): number {
    if (records.length === 0) return 0;
    const correct = records.filter((record) => record.isCorrect).length;
    return Math.round((correct / records.length) * 100) / 100;
}
