import { Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { NotificationsService } from './notifications.service';

@Controller('notifications')
export class NotificationsController {
    constructor(private readonly notificationsService: NotificationsService) { }

    @Get()
    findAll(@CurrentUser() userId: number, @Query() query: PaginationQueryDto) {
        return this.notificationsService.findAll(userId, toPage(query));
    }

    @Post('read')
    async markAllAsRead(@CurrentUser() userId: number) {
        const updated = await this.notificationsService.markAllAsRead(userId);
        return { updated };
    }

    @Post(':id/read')
    markAsRead(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        return this.notificationsService.markAsRead(userId, id);
    }
}
