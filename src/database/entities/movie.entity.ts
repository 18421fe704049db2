import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

@Entity('movies')
export class MovieRecord {
  // surrogate key, defines insertion order
  @PrimaryGeneratedColumn({ name: 'id' })
  id!: number;

  @Column({ name: 'movie_uid', unique: true })
  movieUid!: string; // domain identifier (uuid)

  @Column({ name: 'title' })
  title!: string;

  @Column({ name: 'release_year', type: 'int' })
  releaseYear!: number;

  @Column({ name: 'description', type: 'text', default: '' })
  description!: string;

  @Column({ name: 'rating', type: 'double precision', nullable: true })
  rating!: number | null;

  @Column({ name: 'tags', type: 'simple-json' })
  tags!: string[];
}
