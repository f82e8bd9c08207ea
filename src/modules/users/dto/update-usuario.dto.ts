// src/modules/users/dto/update-usuario.dto.ts
import { Expose } from 'class-transformer';
import { IsBoolean, IsEmail, IsInt, IsOptional, IsString, Length, MaxLength, Min, ValidateIf } from 'class-validator';

// Absent skips the checks; null goes through them and fails
const IsPresent = (): PropertyDecorator => ValidateIf((_object, value) => value !== undefined);

// Partial update: every field is optional, none is bound to a rule table.
// Only ficha_id and rol_id can be cleared with null.
export class UpdateUsuarioDto {
    @Expose()
    @IsPresent()
    @IsString({ message: "El campo 'nombres' debe ser de tipo texto." })
    @Length(3, 100, { message: "El campo 'nombres' debe tener entre 3 y 100 caracteres." })
    nombres?: string;

    @Expose()
    @IsPresent()
    @IsString({ message: "El campo 'apellidos' debe ser de tipo texto." })
    @Length(3, 100, { message: "El campo 'apellidos' debe tener entre 3 y 100 caracteres." })
    apellidos?: string;

    @Expose()
    @IsPresent()
    @IsInt({ message: "El campo 'tipo_documento_id' debe ser un número entero." })
    @Min(1)
    tipo_documento_id?: number;

    @Expose()
    @IsPresent()
    @IsString({ message: "El campo 'documento' debe ser de tipo texto." })
    @Length(10, 11, { message: "El campo 'documento' debe tener entre 10 y 11 caracteres." })
    documento?: string;

    @Expose()
    @IsPresent()
    @IsInt({ message: "El campo 'genero_id' debe ser un número entero." })
    @Min(1)
    genero_id?: number;

    @Expose()
    @IsPresent()
    @IsString({ message: "El campo 'telefono' debe ser de tipo texto." })
    @Length(8, 15, { message: "El campo 'telefono' debe tener entre 8 y 15 caracteres." })
    telefono?: string;

    @Expose()
    @IsPresent()
    @IsEmail({}, { message: "El campo 'correo' debe ser un correo electrónico válido." })
    @MaxLength(100)
    correo?: string;

    @Expose()
    @IsOptional()
    @IsInt({ message: "El campo 'ficha_id' debe ser un número entero." })
    @Min(1)
    ficha_id?: number | null;

    @Expose()
    @IsOptional()
    @IsInt({ message: "El campo 'rol_id' debe ser un número entero." })
    @Min(1)
    rol_id?: number | null;

    @Expose()
    @IsPresent()
    @IsBoolean({ message: "El campo 'activo' debe ser de tipo booleano." })
    activo?: boolean;

    @Expose()
    @IsPresent()
    @IsString({ message: "El campo 'contrasena' debe ser de tipo texto." })
    @Length(8, 50, { message: "El campo 'contrasena' debe tener entre 8 y 50 caracteres." })
    contrasena?: string;
}
