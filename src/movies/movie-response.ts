import { Movie } from '../catalog/domain/movie';

export interface MovieResponse {
  id: string;
  title: string;
  year: number;
  description: string;
  rating: number | null;
  tags: string[];
}

export function toMovieResponse(movie: Movie): MovieResponse {
  return {
    id: movie.id,
    title: movie.title,
    year: movie.year,
    description: movie.description,
    rating: movie.rating,
    tags: [...movie.tags],
  };
}
