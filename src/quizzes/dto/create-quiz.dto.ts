import { ArrayMinSize, ArrayUnique, IsArray, IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, MaxLength } from 'class-validator';

export class CreateQuizDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    title!: string;

    @IsString()
    @IsOptional()
    description?: string;

    @IsInt()
    @IsPositive()
    companyId!: number;

    @IsArray()
    @ArrayMinSize(2)
    @ArrayUnique()
    @IsInt({ each: true })
    questionIds!: number[];
}
