import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class JoinRequestDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    title!: string;

    @IsString()
    description!: string;
}
