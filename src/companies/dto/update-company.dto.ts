import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateCompanyDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    @IsOptional()
    name?: string;

    @IsString()
    @IsOptional()
    description?: string;
}

export class ChangeVisibilityDto {
    @IsBoolean()
    isVisible!: boolean;
}
