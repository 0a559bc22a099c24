import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

@ApiTags('App')
@Controller()
export class AppController {
  @Get()
  @ApiOperation({ summary: 'Endpoint raíz de la API' })
  getStatus() {
    return { service: 'nginx-site-installer', status: 'ok' };
  }
}
