import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp, GLOBAL_PREFIX } from './app.setup';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));

  const config = new DocumentBuilder()
    .setTitle('Nginx Site Installer API')
    .setDescription('Genera e instala el virtual host de Nginx que sirve la aplicación uwsgi')
    .setVersion('1.0')
    .addTag('nginx')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'Token',
        description: 'Ingresa tu INSTALLER_TOKEN',
      },
      'bearer',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(`${GLOBAL_PREFIX}/api`, app, document);

  const port = process.env.PORT ?? 3000;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`Backend corriendo en: http://localhost:${port}/${GLOBAL_PREFIX}`);
  logger.log(`Swagger UI disponible en: http://localhost:${port}/${GLOBAL_PREFIX}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
