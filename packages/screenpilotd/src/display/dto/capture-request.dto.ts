import { IsArray, IsOptional, IsString } from 'class-validator';

export class CaptureRequestDto {
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  monitorIds?: string[];
}
