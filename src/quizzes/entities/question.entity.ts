import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Company } from '../../companies/entities/company.entity';
import { Quiz } from './quiz.entity';

@Entity('question')
export class Question {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar' })
    title!: string;

    // Null while the question sits in the company's pool, set once a quiz takes it.
    @Column({ name: 'quiz_id', type: 'int', nullable: true })
    quizId!: number | null;

    @ManyToOne(() => Quiz, { onDelete: 'CASCADE', nullable: true })
    @JoinColumn({ name: 'quiz_id' })
    quiz?: Quiz | null;

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
