import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Company } from '../../companies/entities/company.entity';

export enum InvitationStatus {
    PENDING = 'pending',
    ACCEPTED = 'accepted',
    DECLINED = 'declined',
}

/**
 * Either an owner's invitation to a user or a user's request to join, told apart
 * by whether the sender owns the company. Cancelling deletes the row.
 */
@Entity('invitation')
export class Invitation {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar' })
    title!: string;

    @Column({ type: 'text' })
    description!: string;

    @Column({ name: 'sender_id', type: 'int' })
    senderId!: number;

    @Column({ name: 'receiver_id', type: 'int' })
    receiverId!: number;

    @Column({ name: 'company_id', type: 'int' })
    companyId!: number;

    @ManyToOne(() => Company, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'company_id' })
    company?: Company;

    @Column({
        type: 'simple-enum',
        enum: InvitationStatus,
        default: InvitationStatus.PENDING,
    })
    status!: InvitationStatus;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
