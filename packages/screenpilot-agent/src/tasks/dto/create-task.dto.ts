import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Min,
} from 'class-validator';

export class CreateTaskDto {
  @IsNotEmpty()
  @IsString()
  instruction!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxIterations?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxElapsedMs?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  maxCost?: number;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  monitorIds?: string[];

  // Another desktop daemon than the configured one
  @IsOptional()
  @IsUrl({ require_tld: false })
  desktopBaseUrl?: string;
}
