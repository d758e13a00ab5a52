import { ArrayMaxSize, ArrayMinSize, ArrayUnique, IsArray, IsInt, IsNotEmpty, IsPositive, IsString, MaxLength } from 'class-validator';

export class CreateQuestionDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    title!: string;

    @IsInt()
    @IsPositive()
    companyId!: number;

    @IsArray()
    @ArrayMinSize(2)
    @ArrayMaxSize(4)
    @ArrayUnique()
    @IsInt({ each: true })
    answerIds!: number[];
}
