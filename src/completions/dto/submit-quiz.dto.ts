import { IsNotEmptyObject, IsObject } from 'class-validator';

export class SubmitQuizDto {
    /** Question id to chosen answer id. */
    @IsObject()
    @IsNotEmptyObject()
    answers!: Record<string, number>;
}
