// src/modules/elements/dto/elemento.dto.ts
import { Expose } from 'class-transformer';

/** Body of POST and PUT /elementos, already checked against the `elemento` rules. */
export class ElementoDto {
    @Expose() placa!: number;
    @Expose() serial?: string | null;
    @Expose() tipoElementoId!: number;
    /** yyyy-MM-dd */
    @Expose() fechaAdquisicion!: string;
    @Expose() valorMonetario!: number;
    @Expose() estadoId!: number;
    @Expose() estadoActivo!: boolean;
    // Free text, not covered by the rule table; the service checks its type
    @Expose() observaciones?: string | null;
    @Expose() ambienteId!: number;
    @Expose() inventarioId!: number;
}
