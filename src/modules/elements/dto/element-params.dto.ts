// src/modules/elements/dto/element-params.dto.ts
import { Type } from 'class-transformer';
import { IsIn, IsInt, Max, Min } from 'class-validator';
import { IdParamDto } from '@/dto/id-param.dto';

export class PlacaParamDto {
    @Type(() => Number)
    @IsInt({ message: 'El parámetro placa debe ser un número entero.' })
    @Min(1, { message: 'El parámetro placa debe ser mayor que cero.' })
    @Max(Number.MAX_SAFE_INTEGER, { message: 'El parámetro placa excede el máximo admitido.' })
    placa!: number;
}

export class EstadoActivoParamDto extends IdParamDto {
    @IsIn(['true', 'false'], { message: "El parámetro estado debe ser 'true' o 'false'." })
    estado!: string;
}
