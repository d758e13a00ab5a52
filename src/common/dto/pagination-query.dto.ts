import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class PaginationQueryDto {
    @Type(() => Number)
    @IsInt()
    @Min(0)
    @IsOptional()
    skip?: number;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(100)
    @IsOptional()
    limit?: number;
}

export interface Page {
    skip: number;
    take: number;
}

export function toPage(query: PaginationQueryDto = {}): Page {
    return { skip: query.skip ?? 0, take: query.limit ?? 10 };
}
