import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Movie } from '../../entities/movie.entity';
import { Review } from '../../entities/review.entity';
import { ReviewsService } from './reviews.service';
import { MovieReviewsController, ReviewsController } from './reviews.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Movie, Review])],
  controllers: [MovieReviewsController, ReviewsController],
  providers: [ReviewsService],
  exports: [ReviewsService],
})
export class ReviewsModule {}
