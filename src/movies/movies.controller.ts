import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { MovieCommandService } from '../catalog/movie-command.service';
import { MovieQueryService } from '../catalog/movie-query.service';
import { unwrapOrThrow } from './catalog-http-errors';
import { CreateMovieDto } from './dto/create-movie.dto';
import { ListMoviesQueryDto, toMovieFilter } from './dto/list-movies-query.dto';
import { RateMovieDto } from './dto/rate-movie.dto';
import { TagMovieDto } from './dto/tag-movie.dto';
import { UpdateMovieDto } from './dto/update-movie.dto';
import { MovieResponse, toMovieResponse } from './movie-response';

@Controller('movies')
export class MoviesController {
  constructor(
    private readonly movieCommandService: MovieCommandService,
    private readonly movieQueryService: MovieQueryService,
  ) {}

  @Get()
  async list(@Query() query: ListMoviesQueryDto): Promise<MovieResponse[]> {
    const movies = unwrapOrThrow(
      await this.movieQueryService.listMovies(toMovieFilter(query)),
    );
    return movies.map(toMovieResponse);
  }

  // declared before ':id' so "search" is not taken for an identifier
  @Get('search')
  async search(@Query('q') q?: string): Promise<MovieResponse[]> {
    const movies = await this.movieQueryService.searchByTitle(q ?? '');
    return movies.map(toMovieResponse);
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<MovieResponse> {
    return toMovieResponse(
      unwrapOrThrow(await this.movieQueryService.getMovie(id)),
    );
  }

  @Post()
  async create(@Body() dto: CreateMovieDto): Promise<MovieResponse> {
    const movie = unwrapOrThrow(
      await this.movieCommandService.addMovie({
        title: dto.title,
        year: dto.year,
        description: dto.description,
        rating: dto.rating,
        tags: dto.tags,
      }),
    );
    return toMovieResponse(movie);
  }

  @Patch(':id')
  async update(
    @Param('id') id: string,
    @Body() dto: UpdateMovieDto,
  ): Promise<MovieResponse> {
    // null only means something for rating; elsewhere it is treated as absent
    const movie = unwrapOrThrow(
      await this.movieCommandService.updateMovie(id, {
        title: dto.title ?? undefined,
        year: dto.year ?? undefined,
        description: dto.description ?? undefined,
        rating: dto.rating,
        tags: dto.tags ?? undefined,
      }),
    );
    return toMovieResponse(movie);
  }

  @Put(':id/rating')
  async rate(
    @Param('id') id: string,
    @Body() dto: RateMovieDto,
  ): Promise<MovieResponse> {
    return toMovieResponse(
      unwrapOrThrow(await this.movieCommandService.rateMovie(id, dto.rating)),
    );
  }

  @Post(':id/tags')
  @HttpCode(HttpStatus.OK)
  async addTag(
    @Param('id') id: string,
    @Body() dto: TagMovieDto,
  ): Promise<MovieResponse> {
    return toMovieResponse(
      unwrapOrThrow(await this.movieCommandService.addTag(id, dto.tag)),
    );
  }

  @Delete(':id/tags/:tag')
  async removeTag(
    @Param('id') id: string,
    @Param('tag') tag: string,
  ): Promise<MovieResponse> {
    return toMovieResponse(
      unwrapOrThrow(await this.movieCommandService.removeTag(id, tag)),
    );
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.movieCommandService.deleteMovie(id));
  }
}
