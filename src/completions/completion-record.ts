export interface CompletionAnswer {
    questionId: number;
    answerId: number;
    answerText: string;
    isCorrect: boolean;
    createdAt: string;
}

/** Cached summary of one user's latest submission of a quiz. */
export interface CompletionRecord {
    userId: number;
    companyId: number;
    quizId: number;
    /** ISO-8601 time of the submission. */
    timestamp: string;
    answers: CompletionAnswer[];
}

export interface CompletionFilter {
    userId?: number;
    companyId?: number;
    quizId?: number;
}

const KEY_PREFIX = 'answered_quiz';

/** Exact key when every part is given, otherwise a glob with `*` for the missing parts. */
export function completionKey(filter: CompletionFilter): string {
    const part = (value: number | undefined) => (value === undefined ? '*' : String(value));
    return `${KEY_PREFIX}_${part(filter.userId)}_${part(filter.companyId)}_${part(filter.quizId)}`;
}

export function matchesFilter(record: CompletionRecord, filter: CompletionFilter): boolean {
    return (filter.userId === undefined || record.userId === filter.userId)
        && (filter.companyId === undefined || record.companyId === filter.companyId)
        && (filter.quizId === undefined || record.quizId === filter.quizId);
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCompletionAnswer(value: unknown): value is CompletionAnswer {
    return isRecordObject(value)
        && typeof value.questionId === 'number'
        && typeof value.answerId === 'number'
        && typeof value.answerText === 'string'
        && typeof value.isCorrect === 'boolean'
        && typeof value.createdAt === 'string';
}

export function isCompletionRecord(value: unknown): value is CompletionRecord {
    return isRecordObject(value)
        && typeof value.userId === 'number'
        && typeof value.companyId === 'number'
        && typeof value.quizId === 'number'
        && typeof value.timestamp === 'string'
        && !Number.isNaN(Date.parse(value.timestamp))
        && Array.isArray(value.answers)
        && value.answers.every(isCompletionAnswer);
}
