import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { ErrorCodes } from '../common/filters/error-codes';
import { StorefrontProvider } from '../providers/game-provider';
import { GameRecord, ProviderSearchResult } from '../types/game.types';
import { SteamAppQueryDto } from './dto/steam-app-query.dto';
import { SteamSearchDto } from './dto/steam-search.dto';

@ApiTags('Steam')
@Controller('api/steam')
export class SteamController {
  constructor(private readonly storefront: StorefrontProvider) {}

  @Get('search')
  @ApiOperation({
    summary: 'Steam 스토어 검색',
    description: '검색어로 찾은 Steam 게임의 상세 정보(가격 포함)를 반환합니다.',
  })
  @ApiOkResponse({
    description: '게임 타입만 포함된 검색 결과',
    schema: { example: { records: [], total: 0 } },
  })
  search(@Query() dto: SteamSearchDto): Promise<ProviderSearchResult> {
    return this.storefront.search(dto.query, { currency: dto.currency });
  }

  @Get('apps/:appId')
  @ApiOperation({ summary: 'Steam 앱 상세 조회' })
  @ApiParam({ name: 'appId', description: 'Steam AppID', example: '1145360' })
  async getApp(
    @Param('appId') appId: string,
    @Query() dto: SteamAppQueryDto,
  ): Promise<GameRecord> {
    const record = await this.storefront.getDetails(appId, { currency: dto.currency });
    if (!record) {
      throw new NotFoundException({
        code: ErrorCodes.DATA_NOT_FOUND,
        message: `Steam 게임을 찾을 수 없습니다: ${appId}`,
      });
    }
    return record;
  }
}
