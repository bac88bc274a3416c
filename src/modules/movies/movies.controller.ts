import {
  Body,
  Controller,
  DefaultValuePipe,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Put,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOkResponse,
  ApiOperation,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { MoviesService, DEFAULT_TOP_RATED_LIMIT } from './movies.service';
import { CreateMovieDto } from './dto/create-movie.dto';
import { UpdateMovieDto } from './dto/update-movie.dto';
import { SearchMoviesDto } from './dto/search-movies.dto';
import { Movie } from '../../entities/movie.entity';
import type { Page } from '../../common/pagination/page';

const MOVIE_NOT_FOUND_EXAMPLE = {
  statusCode: 404,
  error: 'Movie Not Found',
  message: 'Movie with ID 42 not found',
};

const INVALID_SEARCH_EXAMPLE = {
  statusCode: 400,
  error: 'Invalid Search Parameter',
  message:
    "Invalid value for field 'minRating': 9. Minimum rating cannot be greater than maximum rating (5)",
  field: 'minRating',
};

@ApiTags('movies')
@Controller('movies')
export class MoviesController {
  constructor(private readonly moviesService: MoviesService) {}

  @Post()
  @ApiOperation({ summary: 'Create a movie', description: 'New movies start without a rating.' })
  @ApiBody({ type: CreateMovieDto })
  @ApiResponse({ status: 201, description: 'Movie created', type: Movie })
  @ApiResponse({ status: 400, description: 'Invalid movie data' })
  @ApiResponse({
    status: 409,
    description: 'A movie with this title and director already exists',
    schema: {
      example: {
        statusCode: 409,
        error: 'Conflict',
        message: "Movie 'The Quiet Orbit' by director 'Mara Lindqvist' already exists",
      },
    },
  })
  create(@Body() dto: CreateMovieDto): Promise<Movie> {
    return this.moviesService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List all movies' })
  @ApiOkResponse({ type: Movie, isArray: true })
  findAll(): Promise<Movie[]> {
    return this.moviesService.findAll();
  }

  @Get('search')
  @ApiOperation({
    summary: 'Search movies',
    description:
      'All filters are optional and combine with AND. Unrated movies never match a rating bound.',
  })
  @ApiResponse({ status: 200, description: 'Paged result' })
  @ApiResponse({ status: 400, description: 'Invalid search parameter', schema: { example: INVALID_SEARCH_EXAMPLE } })
  search(@Query() query: SearchMoviesDto): Promise<Page<Movie>> {
    return this.moviesService.search(query);
  }

  @Get('top-rated')
  @ApiOperation({ summary: 'Highest rated movies' })
  @ApiQuery({ name: 'limit', required: false, description: 'Clamped into 1-50', example: 10 })
  @ApiOkResponse({ type: Movie, isArray: true })
  topRated(
    @Query('limit', new DefaultValuePipe(DEFAULT_TOP_RATED_LIMIT), ParseIntPipe) limit: number,
  ): Promise<Movie[]> {
    return this.moviesService.topRated(limit);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a movie by id' })
  @ApiOkResponse({ type: Movie })
  @ApiResponse({ status: 404, description: 'Movie not found', schema: { example: MOVIE_NOT_FOUND_EXAMPLE } })
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Movie> {
    return this.moviesService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a movie', description: 'Omitted fields keep their values; rating cannot be set.' })
  @ApiBody({ type: UpdateMovieDto })
  @ApiOkResponse({ type: Movie })
  @ApiResponse({ status: 400, description: 'Invalid movie data' })
  @ApiResponse({ status: 404, description: 'Movie not found', schema: { example: MOVIE_NOT_FOUND_EXAMPLE } })
  @ApiResponse({ status: 409, description: 'Duplicate title and director' })
  update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateMovieDto,
  ): Promise<Movie> {
    return this.moviesService.update(id, dto);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a movie', description: 'Same partial semantics as PATCH.' })
  @ApiBody({ type: UpdateMovieDto })
  @ApiOkResponse({ type: Movie })
  @ApiResponse({ status: 400, description: 'Invalid movie data' })
  @ApiResponse({ status: 404, description: 'Movie not found', schema: { example: MOVIE_NOT_FOUND_EXAMPLE } })
  @ApiResponse({ status: 409, description: 'Duplicate title and director' })
  replace(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateMovieDto,
  ): Promise<Movie> {
    return this.moviesService.update(id, dto);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a movie and its reviews' })
  @ApiResponse({ status: 200, description: 'Deleted', schema: { example: { ok: true } } })
  @ApiResponse({ status: 404, description: 'Movie not found', schema: { example: MOVIE_NOT_FOUND_EXAMPLE } })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<{ ok: true }> {
    await this.moviesService.remove(id);
    return { ok: true };
  }
}
