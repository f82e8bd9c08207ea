// src/dto/id-param.dto.ts
import { Type } from 'class-transformer';
import { IsInt, Min } from 'class-validator';

/** Route parameter `:id` of every resource: a positive integer primary key. */
export class IdParamDto {
    @Type(() => Number)
    @IsInt({ message: 'El parámetro id debe ser un número entero.' })
    @Min(1, { message: 'El parámetro id debe ser mayor que cero.' })
    id!: number;
}
