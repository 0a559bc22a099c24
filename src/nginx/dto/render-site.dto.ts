import { ApiProperty } from '@nestjs/swagger';
import { IsString, IsNotEmpty, Matches, MaxLength } from 'class-validator';
import { SiteInput } from '../site-bindings';

// Nombre DNS en minúsculas, etiquetas de 1 a 63 caracteres
export const HOSTNAME_PATTERN =
  /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/;

// `<hostname>.conf.tmp` no puede pasar de 255 bytes
export const HOSTNAME_MAX_LENGTH = 245;

// Ruta absoluta sin barra final ni caracteres con significado para Nginx
export const DIRECTORY_PATTERN = /^(?:\/[^\s;{}'"\\/$#]+)+$/;

export class RenderSiteDto implements SiteInput {
  @ApiProperty({ example: 'example.com', description: 'Valor de server_name del virtual host' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(HOSTNAME_MAX_LENGTH)
  @Matches(HOSTNAME_PATTERN, {
    message: 'El hostname solo permite letras minúsculas, números, guiones (-) y puntos.',
  })
  hostname!: string;

  @ApiProperty({
    example: '/var/run/app',
    description: 'Directorio de ejecución; el socket uwsgi vive en <runDir>/main/sockets/uwsgi.unix',
  })
  @IsString()
  @Matches(DIRECTORY_PATTERN, {
    message: 'runDir debe ser una ruta absoluta sin barra final.',
  })
  runDir!: string;

  @ApiProperty({
    example: '/opt/app',
    description: 'Directorio de instalación; los estáticos se sirven desde <installDir>/resources/',
  })
  @IsString()
  @Matches(DIRECTORY_PATTERN, {
    message: 'installDir debe ser una ruta absoluta sin barra final.',
  })
  installDir!: string;
}
