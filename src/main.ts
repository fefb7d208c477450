import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { CustomLogger } from './common/utils/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    // Stripe signatures are computed over the exact request bytes
    rawBody: true,
    logger: new CustomLogger(),
  });

  // 全局验证管道
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));

  // 全局前缀
  app.setGlobalPrefix('api/v1');

  // Swagger 配置
  const config = new DocumentBuilder()
    .setTitle('Subscription Access Reconciler')
    .setDescription('Keeps paid subscriptions and private group membership in agreement')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  app.enableShutdownHooks();

  const { port } = app.get(ConfigService).getOrThrow<AppConfig['app']>('config.app');
  await app.listen(port);
}

void bootstrap();
