import { Controller, Delete, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { MembershipService } from './membership.service';

@Controller('companies/:companyId/members')
export class MembershipController {
    constructor(private readonly membershipService: MembershipService) { }

    @Get()
    findAll(
        @CurrentUser() userId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: PaginationQueryDto,
    ) {
        return this.membershipService.listMembers(userId, companyId, toPage(query));
    }

    @Get('admins')
    findAdmins(
        @CurrentUser() userId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Query() query: PaginationQueryDto,
    ) {
        return this.membershipService.listAdmins(userId, companyId, toPage(query));
    }

    @Post('leave')
    leave(@CurrentUser() userId: number, @Param('companyId', ParseIntPipe) companyId: number) {
        return this.membershipService.leaveCompany(userId, companyId);
    }

    @Delete(':userId')
    remove(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Param('userId', ParseIntPipe) targetUserId: number,
    ) {
        return this.membershipService.removeMember(actorId, companyId, targetUserId);
    }

    @Post(':userId/admin')
    appointAdmin(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Param('userId', ParseIntPipe) targetUserId: number,
    ) {
        return this.membershipService.appointAdmin(actorId, companyId, targetUserId);
    }

    @Delete(':userId/admin')
    removeAdmin(
        @CurrentUser() actorId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Param('userId', ParseIntPipe) targetUserId: number,
    ) {
        return this.membershipService.removeAdmin(actorId, companyId, targetUserId);
    }
}
