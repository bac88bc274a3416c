import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  OneToMany,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Review } from './review.entity';
import { decimalTransformer } from '../common/transformers/decimal.transformer';

@Entity('movies')
export class Movie {
  @ApiProperty({ description: 'Movie ID', example: 1 })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ description: 'Movie title', example: 'The Quiet Orbit', maxLength: 255 })
  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @ApiProperty({ description: 'Director', example: 'Mara Lindqvist', maxLength: 255 })
  @Column({ type: 'varchar', length: 255 })
  director!: string;

  @ApiProperty({ description: 'Genre', example: 'Sci-Fi', maxLength: 100 })
  @Index()
  @Column({ type: 'varchar', length: 100 })
  genre!: string;

  @ApiProperty({ description: 'Release year', example: 2014, minimum: 1888 })
  @Column({ type: 'int' })
  release_year!: number;

  @ApiProperty({
    description: 'Average of review ratings rounded to one decimal; null while unreviewed',
    example: 8.4,
    nullable: true,
    minimum: 0,
    maximum: 10,
  })
  @Column({
    type: 'decimal',
    precision: 3,
    scale: 1,
    nullable: true,
    transformer: decimalTransformer,
  })
  rating!: number | null;

  @OneToMany(() => Review, (review) => review.movie)
  reviews?: Review[];

  @ApiProperty({ description: 'Creation timestamp' })
  @CreateDateColumn()
  created_at!: Date;

  @ApiProperty({ description: 'Last update timestamp' })
  @UpdateDateColumn()
  updated_at!: Date;
}
