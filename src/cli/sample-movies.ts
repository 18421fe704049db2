import { MovieInput } from '../catalog/domain/movie';

export const SAMPLE_MOVIES: readonly MovieInput[] = [
  {
    title: 'The Matrix',
    year: 1999,
    description: 'A hacker learns that the world around him is a simulation',
    rating: 9.0,
    tags: ['sci-fi', 'action'],
  },
  {
    title: 'Inception',
    year: 2010,
    description: 'A crew steals secrets by entering dreams',
    rating: 8.8,
    tags: ['sci-fi', 'thriller'],
  },
  {
    title: 'The Godfather',
    year: 1972,
    description: 'A crime family passes from father to son',
    rating: 9.2,
    tags: ['drama', 'crime'],
  },
  {
    title: 'Pulp Fiction',
    year: 1994,
    description: 'Crossing stories from the Los Angeles underworld',
    rating: 8.9,
    tags: ['crime', 'drama'],
  },
  {
    title: 'Unrated Movie',
    year: 2023,
    description: 'Waiting for a first viewing',
    tags: ['mystery'],
  },
];
