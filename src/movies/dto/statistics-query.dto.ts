import { IsInt, IsOptional, Min } from 'class-validator';
import { RejectBlankNumber } from './reject-blank-number';

export class StatisticsQueryDto {
  @IsOptional()
  @RejectBlankNumber()
  @IsInt()
  @Min(0)
  top?: number;
}
