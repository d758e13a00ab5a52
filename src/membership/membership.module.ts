import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Membership } from './entities/membership.entity';
import { MembershipController } from './membership.controller';
import { MembershipService } from './membership.service';
import { PermissionChecker } from './permission-checker';
import { PermissionService } from './permission.service';

@Module({
    imports: [TypeOrmModule.forFeature([Membership])],
    controllers: [MembershipController],
    providers: [
        MembershipService,
        { provide: PermissionChecker, useClass: PermissionService },
    ],
    exports: [MembershipService, PermissionChecker],
})
export class MembershipModule { }
