import { Body, Controller, Delete, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { JoinRequestDto } from './dto/join-request.dto';
import { SendInvitationDto } from './dto/send-invitation.dto';
import { InvitationsService } from './invitations.service';

@Controller('invitations')
export class InvitationsController {
    constructor(private readonly invitationsService: InvitationsService) { }

    @Post()
    send(@CurrentUser() userId: number, @Body() sendInvitationDto: SendInvitationDto) {
        return this.invitationsService.sendInvitation(userId, sendInvitationDto);
    }

    @Get('received')
    received(@CurrentUser() userId: number, @Query() query: PaginationQueryDto) {
        return this.invitationsService.listReceived(userId, toPage(query));
    }

    @Get('sent')
    sent(@CurrentUser() userId: number, @Query() query: PaginationQueryDto) {
        return this.invitationsService.listSent(userId, toPage(query));
    }

    @Post(':id/accept')
    accept(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        return this.invitationsService.accept(id, userId);
    }

    @Post(':id/decline')
    decline(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        return this.invitationsService.decline(id, userId);
    }

    @Delete(':id')
    async cancel(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        const deletedId = await this.invitationsService.cancel(id, userId);
        return { deletedId };
    }
}

@Controller('companies/:companyId/join-requests')
export class JoinRequestsController {
    constructor(private readonly invitationsService: InvitationsService) { }

    @Post()
    create(
        @CurrentUser() userId: number,
        @Param('companyId', ParseIntPipe) companyId: number,
        @Body() joinRequestDto: JoinRequestDto,
    ) {
        return this.invitationsService.requestToJoin(userId, companyId, joinRequestDto);
    }
}
