import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

function collectMessages(errors: ValidationError[]): string[] {
    return errors.flatMap((error) => [
        ...Object.values(error.constraints ?? {}),
        ...collectMessages(error.children ?? []),
    ]);
}

// Same rules the global ValidationPipe applies, for callers that bypass HTTP.
export async function validateDto<T extends object>(cls: ClassConstructor<T>, input: object): Promise<T> {
    const dto = plainToInstance(cls, input);
    const errors = await validate(dto, { whitelist: true });
    if (errors.length > 0) {
        throw new BadRequestException(collectMessages(errors));
    }
    return dto;
}
