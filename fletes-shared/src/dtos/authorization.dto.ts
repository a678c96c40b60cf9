import { ArrayMinSize, ArrayUnique, IsArray, IsOptional, IsString } from 'class-validator';

export class AuthorizeBundleDto {
  @IsOptional()
  @IsString()
  observations?: string;
}

export class BulkAuthorizeDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayUnique()
  @IsString({ each: true })
  bundleIds!: string[];

  @IsOptional()
  @IsString()
  observations?: string;
}
