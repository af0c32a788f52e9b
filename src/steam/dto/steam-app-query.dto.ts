import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { Currency, CURRENCIES } from '../../types/game.types';

export class SteamAppQueryDto {
  @ApiPropertyOptional({ description: '가격 통화', enum: [...CURRENCIES], default: 'USD' })
  @IsOptional()
  @IsIn(CURRENCIES)
  currency?: Currency;
}
