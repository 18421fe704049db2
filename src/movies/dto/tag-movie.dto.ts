import { IsNotEmpty, IsString } from 'class-validator';

export class TagMovieDto {
  @IsString()
  @IsNotEmpty()
  tag!: string;
}
