import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { INDICATOR_TYPES, IndicatorType } from '../../domain/types/indicator.type';

export class ChartQueryDto {
  @IsIn(INDICATOR_TYPES, { message: `indicator must be one of ${INDICATOR_TYPES.join(', ')}` })
  indicator!: IndicatorType;

  @IsOptional()
  @IsInt({ message: 'maxPoints must be an integer' })
  @Min(2)
  @Max(5000)
  maxPoints?: number;

  /** Epoch milliseconds of the pointer position. */
  @IsOptional()
  @IsInt({ message: 'at must be a timestamp in milliseconds' })
  @Min(0)
  at?: number;
}
