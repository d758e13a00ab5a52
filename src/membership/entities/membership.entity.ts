import {
    Entity,
    Column,
    PrimaryGeneratedColumn,
    CreateDateColumn,
    UpdateDateColumn,
    Index,
    ManyToOne,
    JoinColumn,
} from 'typeorm';
import { Role } from '../../common/role';
import { Company } from '../../companies/entities/company.entity';

/**
 * A user's current company affiliation. There is exactly one row per user and it
 * is reused: leaving a company sets `companyId` to null and `role` to UNEMPLOYED
 * instead of deleting the row, so a user belongs to at most one company at a time.
 */
@Entity('member')
export class Membership {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index({ unique: true })
    @Column({ name: 'user_id', type: 'int' })
    userId!: number;

    @Column({ name: 'company_id', type: 'int', nullable: true })
    companyId!: number | null;

    @ManyToOne(() => Company, { onDelete: 'CASCADE', nullable: true })
    @JoinColumn({ name: 'company_id' })
    company?: Company | null;

    @Column({ type: 'int', default: Role.UNEMPLOYED })
    role!: Role;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
