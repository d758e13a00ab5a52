import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Company } from '../../companies/entities/company.entity';
import { Question } from './question.entity';

@Entity('answer')
export class Answer {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar' })
    text!: string;

    @Column({ name: 'is_correct', type: 'boolean', default: false })
    isCorrect!: boolean;

    @Column({ name: 'question_id', type: 'int', nullable: true })
    questionId!: number | null;

    @ManyToOne(() => Question, { onDelete: 'CASCADE', nullable: true })
    @JoinColumn({ name: 'question_id' })
    question?: Question | null;

    @Column({ name: 'company_id', type: 'int', nullable: true })
    companyId!: number | null;

    @ManyToOne(() => Company, { onDelete: 'CASCADE', nullable: true })
    @JoinColumn({ name: 'company_id' })
    company?: Company | null;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
