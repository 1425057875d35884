import { IsIn, IsOptional, Matches } from 'class-validator';
import { TIMEFRAME_OPTIONS } from '../timeframes';

export class ChartQueryDto {
  @IsOptional()
  @IsIn(TIMEFRAME_OPTIONS.map((option) => option.value))
  timeframe?: string;

  /** Explicit day count; wins over timeframe. "max" is passed through. */
  @IsOptional()
  @Matches(/^(\d{1,4}|max)$/)
  days?: string;

  @IsOptional()
  @IsIn(['daily', 'hourly'])
  interval?: string;
}
