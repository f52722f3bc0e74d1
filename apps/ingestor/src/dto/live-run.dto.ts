import { IsOptional, Matches } from 'class-validator';

export class LiveRunDto {
  @IsOptional()
  @Matches(/^[a-z0-9-]+$/, { message: 'coinId must be a lowercase CoinGecko id' })
  coinId?: string;
}
