import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';

// Append-only history of submitted answers; the system of record for scores.
@Entity('answered_question')
@Index(['userId', 'companyId'])
export class AnsweredQuestion {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'user_id', type: 'int' })
    userId!: number;

    @Column({ name: 'company_id', type: 'int' })
    companyId!: number;

    @Column({ name: 'quiz_id', type: 'int' })
    quizId!: number;

    @Column({ name: 'question_id', type: 'int' })
    questionId!: number;

    @Column({ name: 'answer_id', type: 'int' })
    answerId!: number;

    @Column({ name: 'answer_text', type: 'varchar' })
    answerText!: string;

    @Column({ name: 'is_correct', type: 'boolean' })
    isCorrect!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;
}
