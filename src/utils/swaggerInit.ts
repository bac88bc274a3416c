import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

export const swaggerInit = (app: INestApplication) => {
  const host = process.env.PUBLIC_HOST_IP;
  const port = process.env.PORT || '3000';

  const config = new DocumentBuilder()
    .setTitle('Movie Catalog APIs')
    .setDescription(
      [
        'Movie catalog with reviews and multi-criteria search.',
        '',
        'Notes:',
        "- A movie's rating is the mean of its review ratings rounded half-up to one decimal, or null without reviews",
        '- Review writes recompute the rating in the same transaction',
        '- Search results are paged: page is 0-based, size is clamped into 1-100',
      ].join('\n'),
    )
    .setVersion('1.0.0')
    .addServer(host ? `http://${host}:${port}` : `http://localhost:${port}`)
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);
};
