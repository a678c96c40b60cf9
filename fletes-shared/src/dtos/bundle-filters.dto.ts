import { IsEnum, IsOptional, IsString } from 'class-validator';
import { BundleState } from '../enums/bundle-state.enum';

export class BundleFiltersDto {
  @IsOptional()
  @IsEnum(BundleState)
  state?: BundleState;

  @IsOptional()
  @IsString()
  region?: string;
}
