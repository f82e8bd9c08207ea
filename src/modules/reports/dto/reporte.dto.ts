// src/modules/reports/dto/reporte.dto.ts
import { Expose } from 'class-transformer';

export class ReporteDto {
    @Expose() asunto!: string;
    @Expose() mensaje!: string;
    @Expose() usuario_id!: number;
    @Expose() elemento_id!: number;
}
