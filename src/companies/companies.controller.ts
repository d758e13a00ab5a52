import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Put, Query } from '@nestjs/common';
import { CurrentUser } from '../common/current-user.decorator';
import { PaginationQueryDto, toPage } from '../common/dto/pagination-query.dto';
import { CompaniesService } from './companies.service';
import { CreateCompanyDto } from './dto/create-company.dto';
import { ChangeVisibilityDto, UpdateCompanyDto } from './dto/update-company.dto';

@Controller('companies')
export class CompaniesController {
    constructor(private readonly companiesService: CompaniesService) { }

    @Post()
    create(@CurrentUser() userId: number, @Body() createCompanyDto: CreateCompanyDto) {
        return this.companiesService.create(userId, createCompanyDto);
    }

    @Get()
    findAll(@CurrentUser() userId: number, @Query() query: PaginationQueryDto) {
        return this.companiesService.findAll(userId, toPage(query));
    }

    @Get(':id')
    findOne(@Param('id', ParseIntPipe) id: number) {
        return this.companiesService.findOne(id);
    }

    @Patch(':id')
    update(
        @CurrentUser() userId: number,
        @Param('id', ParseIntPipe) id: number,
        @Body() updateCompanyDto: UpdateCompanyDto,
    ) {
        return this.companiesService.update(userId, id, updateCompanyDto);
    }

    @Put(':id/visibility')
    setVisibility(
        @CurrentUser() userId: number,
        @Param('id', ParseIntPipe) id: number,
        @Body() body: ChangeVisibilityDto,
    ) {
        return this.companiesService.setVisibility(userId, id, body.isVisible);
    }

    @Delete(':id')
    async remove(@CurrentUser() userId: number, @Param('id', ParseIntPipe) id: number) {
        const deletedId = await this.companiesService.remove(userId, id);
        return { deletedId };
    }
}
