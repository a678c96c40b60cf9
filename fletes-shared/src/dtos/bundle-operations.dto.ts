import {
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  ValidateNested
} from 'class-validator';
import { Type } from 'class-transformer';

export class CostOverridesDto {
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) freight?: number;
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) loadUnload?: number;
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) extraPoint?: number;
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) detour?: number;
}

/** Merge requires the operator to state every amount */
export class RequiredCostOverridesDto {
  @Type(() => Number) @IsNumber() @Min(0) freight!: number;
  @Type(() => Number) @IsNumber() @Min(0) loadUnload!: number;
  @Type(() => Number) @IsNumber() @Min(0) extraPoint!: number;
  @Type(() => Number) @IsNumber() @Min(0) detour!: number;
}

export class AdjustBundleDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  vehicleTypeSicetac?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  totalKilosSicetac?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => CostOverridesDto)
  overrides?: CostOverridesDto;

  // An empty string is accepted here so the service can reject it with its own message
  @IsOptional()
  @IsString()
  newDestination?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  destinationFromReal?: string;

  @IsOptional()
  @IsString()
  observations?: string;
}

export class MergeBundlesDto {
  @IsArray()
  @ArrayMinSize(2)
  @ArrayUnique()
  @IsString({ each: true })
  bundleIds!: string[];

  @IsString()
  @IsNotEmpty()
  destination!: string;

  @IsString()
  @IsNotEmpty()
  billingVehicleType!: string;

  @ValidateNested()
  @Type(() => RequiredCostOverridesDto)
  overrides!: RequiredCostOverridesDto;

  @IsOptional()
  @IsString()
  observations?: string;
}

export class KiloSplitDto {
  @IsString()
  @IsNotEmpty()
  integraConsecutive!: string;

  @Type(() => Number)
  @IsNumber()
  @IsPositive()
  kilos!: number;

  /** Required when the consecutive is shared by more than one line */
  @IsOptional()
  @IsString()
  lineId?: string;
}

export class SplitRetainedGroupDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => CostOverridesDto)
  overrides?: CostOverridesDto;
}

export class SplitGroupDto extends SplitRetainedGroupDto {
  /** Integra consecutives, line ids or unload/real destination names to move */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  consignees?: string[];

  @IsOptional()
  @ValidateNested()
  @Type(() => KiloSplitDto)
  kiloSplit?: KiloSplitDto;
}

export class SplitBundleDto {
  @IsString()
  @IsNotEmpty()
  destination!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => SplitRetainedGroupDto)
  groupA?: SplitRetainedGroupDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => SplitGroupDto)
  groupB?: SplitGroupDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => SplitGroupDto)
  groupC?: SplitGroupDto;

  @IsOptional()
  @IsString()
  observations?: string;
}
