import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateQuizDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    @IsOptional()
    title?: string;

    @IsString()
    @IsOptional()
    description?: string;
}
