import { IsBoolean, IsInt, IsNotEmpty, IsPositive, IsString, MaxLength } from 'class-validator';

export class CreateAnswerDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    text!: string;

    @IsBoolean()
    isCorrect!: boolean;

    @IsInt()
    @IsPositive()
    companyId!: number;
}
