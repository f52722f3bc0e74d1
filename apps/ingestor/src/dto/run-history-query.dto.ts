import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class RunHistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit: number = 10;
}
