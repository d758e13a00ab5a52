import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';

export enum NotificationStatus {
    PENDING = 'pending',
    READ = 'read',
}

@Entity('notification')
export class Notification {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'text' })
    message!: string;

    @Index()
    @Column({ name: 'receiver_id', type: 'int' })
    receiverId!: number;

    @Column({ name: 'company_id', type: 'int' })
    companyId!: number;

    @Column({
        type: 'simple-enum',
        enum: NotificationStatus,
        default: NotificationStatus.PENDING,
    })
    status!: NotificationStatus;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;
}
