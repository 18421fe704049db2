import { INestApplicationContext } from '@nestjs/common';
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from 'commander';
import { createInterface } from 'readline';
import {
  CatalogStatistics,
  DEFAULT_TOP_TAG_LIMIT,
} from '../catalog/domain/catalog-statistics';
import { CatalogError } from '../catalog/domain/errors';
import { Movie } from '../catalog/domain/movie';
import {
  MOVIE_SORT_FIELDS,
  MovieSortField,
  SORT_ORDERS,
  SortOrder,
} from '../catalog/domain/movie-filter';
import { MovieCommandService } from '../catalog/movie-command.service';
import { MovieQueryService } from '../catalog/movie-query.service';
import { splitCommandLine } from './command-line';
import { SAMPLE_MOVIES } from './sample-movies';

export interface CliOutput {
  write(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  write: (line) => process.stdout.write(`${line}\n`),
  error: (line) => process.stderr.write(`${line}\n`),
};

interface AddOptions {
  rating?: number;
  tags?: string[];
}

interface ListOptions {
  title?: string;
  year?: number;
  from?: number;
  to?: number;
  minRating?: number;
  maxRating?: number;
  tags?: string[];
  sort?: MovieSortField;
  order?: SortOrder;
}

interface UpdateOptions {
  title?: string;
  year?: number;
  description?: string;
  rating?: number;
  clearRating?: boolean;
  tags?: string[];
}

const EXIT_WORDS = ['exit', 'quit'];

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

export function formatRating(rating: number | null): string {
  return rating === null ? 'unrated' : `${rating.toFixed(1)}/10`;
}

export function describeMovie(movie: Movie): string[] {
  const tags = movie.tags.length > 0 ? ` [${movie.tags.join(', ')}]` : '';
  const lines = [
    `- ${movie.title} (${movie.year}) ${formatRating(movie.rating)}${tags}`,
    `  id: ${movie.id}`,
  ];
  if (movie.description) {
    lines.push(`  ${movie.description}`);
  }
  return lines;
}

export function describeStatistics(stats: CatalogStatistics): string[] {
  const average =
    stats.averageRating === null ? 'n/a' : stats.averageRating.toFixed(2);
  const lines = [
    `Movies: ${stats.count}`,
    `Rated: ${stats.ratedCount}`,
    `Average rating: ${average}`,
  ];

  if (stats.yearRange) {
    lines.push(`Years: ${stats.yearRange.earliest}-${stats.yearRange.latest}`);
  }

  const topTags = stats.topTags
    .map(({ tag, count }) => `${tag} (${count})`)
    .join(', ');
  lines.push(`Top tags: ${topTags || 'none'}`);

  if (stats.ratedCount > 0) {
    lines.push('Rating histogram:');
    for (const [bucket, count] of Object.entries(stats.ratingHistogram)) {
      if (count > 0) {
        lines.push(`  ${bucket.padStart(2)}: ${count}`);
      }
    }
  }

  return lines;
}

/**
 * Command-line front end over the catalog services. `run` never exits the
 * process; it resolves with the exit code the caller should use.
 */
export class CatalogCli {
  private exitCode = 0;

  constructor(
    private readonly movieCommandService: MovieCommandService,
    private readonly movieQueryService: MovieQueryService,
    private readonly output: CliOutput = consoleOutput,
    private readonly input: NodeJS.ReadableStream = process.stdin,
  ) {}

  async run(argv: readonly string[]): Promise<number> {
    this.exitCode = 0;
    const program = this.buildProgram();

    try {
      await program.parseAsync([...argv], { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      throw error;
    }
    return this.exitCode;
  }

  private buildProgram(): Command {
    const program = new Command('movie-catalog')
      .description('Personal movie catalog')
      .exitOverride()
      .configureOutput({
        writeOut: (text) => this.output.write(text.trimEnd()),
        writeErr: (text) => this.output.error(text.trimEnd()),
      });

    program
      .command('add')
      .description('add a movie to the catalog')
      .argument('<title>', 'movie title')
      .argument('<year>', 'release year', parseNumber)
      .argument('[description]', 'plot summary', '')
      .option('-r, --rating <rating>', 'rating from 0 to 10', parseNumber)
      .option('-t, --tags <tags...>', 'tags')
      .action(
        async (
          title: string,
          year: number,
          description: string,
          options: AddOptions,
        ) => {
          const result = await this.movieCommandService.addMovie({
            title,
            year,
            description,
            rating: options.rating,
            tags: options.tags,
          });
          if (result.isErr()) {
            return this.fail(result.error);
          }
          this.print(
            `Added movie: ${result.value.title} (${result.value.year})`,
            `  id: ${result.value.id}`,
          );
        },
      );

    program
      .command('list')
      .description('list movies, optionally filtered and sorted')
      .option('--title <text>', 'title contains text')
      .option('--year <year>', 'exact release year', parseNumber)
      .option('--from <year>', 'released in or after year', parseNumber)
      .option('--to <year>', 'released in or before year', parseNumber)
      .option('--min-rating <rating>', 'minimum rating', parseNumber)
      .option('--max-rating <rating>', 'maximum rating', parseNumber)
      .option('--tags <tags...>', 'movies carrying all of these tags')
      .addOption(
        new Option('--sort <field>', 'sort field').choices(MOVIE_SORT_FIELDS),
      )
      .addOption(
        new Option('--order <order>', 'sort order').choices(SORT_ORDERS),
      )
      .action(async (options: ListOptions) => {
        const result = await this.movieQueryService.listMovies({
          titleContains: options.title,
          year: options.year,
          yearFrom: options.from,
          yearTo: options.to,
          minRating: options.minRating,
          maxRating: options.maxRating,
          tags: options.tags,
          sortBy: options.sort,
          order: options.order,
        });
        if (result.isErr()) {
          return this.fail(result.error);
        }
        if (result.value.length === 0) {
          return this.print('No movies found.');
        }
        this.print(`Found ${result.value.length} movie(s):`);
        this.printMovies(result.value);
      });

    program
      .command('search')
      .description('find movies whose title contains the query, ignoring case')
      .argument('<query>', 'part of the title')
      .action(async (query: string) => {
        const movies = await this.movieQueryService.searchByTitle(query);
        if (movies.length === 0) {
          return this.print(`No movies match "${query}".`);
        }
        this.print(`Found ${movies.length} movie(s) matching "${query}":`);
        this.printMovies(movies);
      });

    program
      .command('show')
      .description('show one movie')
      .argument('<id>', 'movie id')
      .action(async (id: string) => {
        const result = await this.movieQueryService.getMovie(id);
        if (result.isErr()) {
          return this.fail(result.error);
        }
        this.printMovies([result.value]);
      });

    program
      .command('update')
      .description('change some fields of a movie')
      .argument('<id>', 'movie id')
      .option('--title <title>', 'new title')
      .option('--year <year>', 'new release year', parseNumber)
      .option('--description <text>', 'new description')
      .addOption(
        new Option('--rating <rating>', 'new rating')
          .argParser(parseNumber)
          .conflicts('clearRating'),
      )
      .option('--clear-rating', 'remove the rating')
      .option('--tags <tags...>', 'replace all tags')
      .action(async (id: string, options: UpdateOptions) => {
        const result = await this.movieCommandService.updateMovie(id, {
          title: options.title,
          year: options.year,
          description: options.description,
          rating: options.clearRating ? null : options.rating,
          tags: options.tags,
        });
        if (result.isErr()) {
          return this.fail(result.error);
        }
        const { title, year } = result.value;
        this.print(`Updated movie: ${title} (${year})`);
      });

    program
      .command('rate')
      .description('rate a movie from 0 to 10')
      .argument('<id>', 'movie id')
      .argument('<rating>', 'rating', parseNumber)
      .action(async (id: string, rating: number) => {
        const result = await this.movieCommandService.rateMovie(id, rating);
        if (result.isErr()) {
          return this.fail(result.error);
        }
        const rated = result.value;
        this.print(`Rated ${rated.title}: ${formatRating(rated.rating)}`);
      });

    program
      .command('tag')
      .description('add a tag to a movie')
      .argument('<id>', 'movie id')
      .argument('<tag>', 'tag to add')
      .action(async (id: string, tag: string) => {
        const result = await this.movieCommandService.addTag(id, tag);
        if (result.isErr()) {
          return this.fail(result.error);
        }
        this.print(`Tagged ${result.value.title} with "${tag}"`);
      });

    program
      .command('untag')
      .description('remove a tag from a movie')
      .argument('<id>', 'movie id')
      .argument('<tag>', 'tag to remove')
      .action(async (id: string, tag: string) => {
        const result = await this.movieCommandService.removeTag(id, tag);
        if (result.isErr()) {
          return this.fail(result.error);
        }
        this.print(`Removed tag "${tag}" from ${result.value.title}`);
      });

    program
      .command('delete')
      .description('delete a movie')
      .argument('<id>', 'movie id')
      .action(async (id: string) => {
        const result = await this.movieCommandService.deleteMovie(id);
        if (result.isErr()) {
          return this.fail(result.error);
        }
        const { title, year } = result.value;
        this.print(`Deleted movie: ${title} (${year})`);
      });

    program
      .command('stats')
      .description('show catalog statistics')
      .option(
        '--top <count>',
        'number of tags to rank',
        parseCount,
        DEFAULT_TOP_TAG_LIMIT,
      )
      .action(async (options: { top: number }) => {
        const stats = await this.movieQueryService.getStatistics(options.top);
        this.print(...describeStatistics(stats));
      });

    program
      .command('shell')
      .description('run commands interactively against one in-memory catalog')
      .option('--no-seed', 'start with an empty catalog')
      .action(async (options: { seed: boolean }) => {
        await this.shell(options.seed);
      });

    return program;
  }

  /**
   * Storage lives only as long as the process, so the shell is the way to
   * run several commands against the same catalog.
   */
  private async shell(seed: boolean): Promise<void> {
    if (seed) {
      for (const sample of SAMPLE_MOVIES) {
        const added = await this.movieCommandService.addMovie(sample);
        if (added.isErr()) {
          throw added.error;
        }
      }
      this.print(`Loaded ${SAMPLE_MOVIES.length} sample movies.`);
    }
    this.print(
      'Enter a command (for example: list, stats, search matrix) or exit to quit.',
    );

    const lines = createInterface({ input: this.input, terminal: false });
    for await (const line of lines) {
      const args = splitCommandLine(line);
      if (args.length === 0) {
        continue;
      }
      if (EXIT_WORDS.includes(args[0])) {
        break;
      }
      if (args[0] === 'shell') {
        this.output.error('Already in the shell.');
        continue;
      }
      await this.run(args);
    }

    this.print('Bye.');
    this.exitCode = 0;
  }

  private printMovies(movies: readonly Movie[]): void {
    for (const movie of movies) {
      this.print(...describeMovie(movie));
    }
  }

  private print(...lines: string[]): void {
    for (const line of lines) {
      this.output.write(line);
    }
  }

  private fail(error: CatalogError): void {
    this.output.error(`Error: ${error.message}`);
    this.exitCode = 1;
  }
}

/**
 * Runs one command line against the services of `app` and closes the context
 * afterwards, also when the command throws.
 */
export async function runCatalogCli(
  app: INestApplicationContext,
  argv: readonly string[],
  output: CliOutput = consoleOutput,
): Promise<number> {
  try {
    const cli = new CatalogCli(
      app.get(MovieCommandService),
      app.get(MovieQueryService),
      output,
    );
    return await cli.run(argv);
  } finally {
    await app.close();
  }
}
