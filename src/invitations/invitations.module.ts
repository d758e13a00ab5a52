import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Company } from '../companies/entities/company.entity';
import { MembershipModule } from '../membership/membership.module';
import { UsersModule } from '../users/users.module';
import { Invitation } from './entities/invitation.entity';
import { InvitationsController, JoinRequestsController } from './invitations.controller';
import { InvitationsService } from './invitations.service';

@Module({
    imports: [TypeOrmModule.forFeature([Invitation, Company]), MembershipModule, UsersModule],
    controllers: [InvitationsController, JoinRequestsController],
    providers: [InvitationsService],
})
export class InvitationsModule { }
