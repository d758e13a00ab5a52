import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsPositive } from 'class-validator';

export class CompletionsQueryDto {
    @Type(() => Number)
    @IsInt()
    @IsPositive()
    @IsOptional()
    companyId?: number;

    @Type(() => Number)
    @IsInt()
    @IsPositive()
    @IsOptional()
    quizId?: number;
}
