import { IsNumber, IsPositive } from 'class-validator';

export class TrendRequestDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  price!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  sma21!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  sma50!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  sma200!: number;
}
