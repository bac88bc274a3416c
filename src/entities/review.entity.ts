import {
  Entity,
  PrimaryGeneratedColumn,
  ManyToOne,
  JoinColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Movie } from './movie.entity';

@Entity('reviews')
export class Review {
  @PrimaryGeneratedColumn()
  id!: number;

  // owner is fixed at creation
  @Index()
  @Column({ type: 'int', update: false })
  movie_id!: number;

  @ManyToOne(() => Movie, (movie) => movie.reviews, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'movie_id' })
  movie?: Movie;

  @Column({ type: 'varchar', length: 100 })
  user_name!: string;

  @Column({ type: 'varchar', length: 2000, nullable: true })
  review_text!: string | null;

  @Column({ type: 'double precision' })
  rating!: number; // 1.0-10.0

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
