// src/modules/inventory/dto/inventario.dto.ts
import { Expose } from 'class-transformer';

/** Body of POST and PUT /inventarios, already checked against the `inventario` rules. */
export class InventarioDto {
    @Expose() nombre!: string;
    /** yyyy-MM-dd */
    @Expose() fecha_creacion!: string;
    @Expose() usuario_admin_id!: number;
}
