import { IsInt, IsNotEmpty, IsPositive, IsString, MaxLength } from 'class-validator';

export class SendInvitationDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    title!: string;

    @IsString()
    description!: string;

    @IsInt()
    @IsPositive()
    receiverId!: number;

    @IsInt()
    @IsPositive()
    companyId!: number;
}
