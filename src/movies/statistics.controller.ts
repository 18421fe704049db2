import { Controller, Get, Query } from '@nestjs/common';
import { CatalogStatistics } from '../catalog/domain/catalog-statistics';
import { MovieQueryService } from '../catalog/movie-query.service';
import { StatisticsQueryDto } from './dto/statistics-query.dto';

@Controller('statistics')
export class StatisticsController {
  constructor(private readonly movieQueryService: MovieQueryService) {}

  @Get()
  async getStatistics(
    @Query() query: StatisticsQueryDto,
  ): Promise<CatalogStatistics> {
    return await this.movieQueryService.getStatistics(query.top);
  }
}
