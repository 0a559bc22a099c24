import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { NginxModule } from './nginx/nginx.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true, // Hace que ConfigModule esté disponible en toda la app
      envFilePath: '.env',
    }),
    NginxModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
