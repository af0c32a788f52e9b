import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

/**
 * Swagger 문서 구성 (/docs)
 */
export function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('Game Metadata Aggregator API')
    .setDescription('RAWG 카탈로그와 Steam 스토어 정보를 합쳐 게임을 추천하는 API입니다.')
    .setVersion('1.0.0')
    .build();

  const document = SwaggerModule.createDocument(app, config, {
    deepScanRoutes: true,
  });

  SwaggerModule.setup('docs', app, document, {
    swaggerOptions: {
      displayRequestDuration: true,
    },
    customSiteTitle: 'Game Metadata Aggregator API Docs',
  });
}
