export interface AnswerView {
    id: number;
    text: string;
    /** Present for admins and the owner only. */
    isCorrect?: boolean;
}

export interface QuestionView {
    id: number;
    title: string;
    answers: AnswerView[];
}

export interface QuizView {
    id: number;
    title: string;
    description: string | null;
    frequency: number;
    companyId: number;
    questions: QuestionView[];
}
