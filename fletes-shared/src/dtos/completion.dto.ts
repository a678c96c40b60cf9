import { ArrayMinSize, IsArray, IsNotEmpty, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class PedidoNumberEntryDto {
  @IsString()
  @IsNotEmpty()
  integraConsecutive!: string;

  @IsString()
  @IsNotEmpty()
  pedidoNumber!: string;
}

export class LoadPedidoNumbersDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PedidoNumberEntryDto)
  entries!: PedidoNumberEntryDto[];
}
