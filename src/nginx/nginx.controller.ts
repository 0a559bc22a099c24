import { Controller, Post, Delete, Get, Body, Param, HttpCode, HttpStatus, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import { NginxService } from './nginx.service';
import { RenderSiteDto } from './dto/render-site.dto';
import { InstallerTokenGuard } from './guards/installer-token.guard';

@ApiTags('nginx')
@Controller('nginx')
export class NginxController {
  constructor(private readonly nginxService: NginxService) {}

  @Get('template')
  @ApiOperation({ summary: 'Plantilla del virtual host y sus marcadores' })
  getTemplate() {
    return this.nginxService.describeTemplate();
  }

  @Post('render')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Generar la configuración sin escribirla' })
  @ApiResponse({
    status: 200,
    description: 'Configuración generada',
    schema: { type: 'object', properties: { config: { type: 'string' } } },
  })
  @ApiResponse({ status: 400, description: 'Falta un valor de configuración o no es válido' })
  render(@Body() dto: RenderSiteDto) {
    return { config: this.nginxService.renderSite(dto) };
  }

  @Post('sites')
  @UseGuards(InstallerTokenGuard)
  @HttpCode(HttpStatus.CREATED)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Instalar la configuración en Nginx y recargarlo' })
  @ApiResponse({
    status: 201,
    description: 'Configuración instalada',
    schema: {
      type: 'object',
      properties: {
        success: { type: 'boolean' },
        message: { type: 'string' },
        filePath: { type: 'string' },
        hostname: { type: 'string' },
        reloaded: { type: 'boolean' },
      },
    },
  })
  @ApiResponse({ status: 401, description: 'Token de autorización inválido o faltante' })
  async installSite(@Body() dto: RenderSiteDto) {
    return this.nginxService.installSite(dto);
  }

  @Post('sites/from-config')
  @UseGuards(InstallerTokenGuard)
  @HttpCode(HttpStatus.CREATED)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Instalar la configuración con INSTALL_HOSTNAME, INSTALL_RUN_DIR e INSTALL_DIR',
  })
  @ApiResponse({ status: 400, description: 'Falta una variable INSTALL_* o no es válida' })
  @ApiResponse({ status: 401, description: 'Token de autorización inválido o faltante' })
  async installSiteFromConfig() {
    return this.nginxService.installSiteFromConfig();
  }

  @Get('sites')
  @ApiOperation({ summary: 'Listar los sitios instalados' })
  listSites() {
    return this.nginxService.listSites();
  }

  @Delete('sites/:hostname')
  @UseGuards(InstallerTokenGuard)
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Eliminar la configuración de un sitio' })
  @ApiParam({ name: 'hostname', example: 'example.com' })
  @ApiResponse({ status: 404, description: 'El sitio no está instalado' })
  async removeSite(@Param('hostname') hostname: string) {
    return this.nginxService.removeSite(hostname);
  }
}
