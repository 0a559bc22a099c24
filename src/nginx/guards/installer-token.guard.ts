import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

/**
 * Protege las rutas que escriben en el directorio de Nginx.
 * Espera `Authorization: Bearer <INSTALLER_TOKEN>`; el prefijo Bearer es opcional.
 */
@Injectable()
export class InstallerTokenGuard implements CanActivate {
  private readonly logger = new Logger(InstallerTokenGuard.name);

  constructor(private configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.configService.get<string>('INSTALLER_TOKEN')?.trim();
    if (!expected) {
      this.logger.error('Instalación bloqueada: falta INSTALLER_TOKEN');
      throw new UnauthorizedException('El instalador no tiene INSTALLER_TOKEN configurado.');
    }

    const { authorization } = context.switchToHttp().getRequest<Request>().headers;
    if (!authorization) {
      this.logger.warn('Petición al instalador sin cabecera Authorization');
      throw new UnauthorizedException('Las rutas del instalador requieren un token Bearer.');
    }

    const token = authorization.replace(/^Bearer\s+/i, '').trim();
    if (token === '') {
      throw new UnauthorizedException('Cabecera Authorization vacía: usa Bearer <INSTALLER_TOKEN>.');
    }

    if (token !== expected) {
      this.logger.warn('Petición al instalador con un token que no coincide');
      throw new UnauthorizedException('El token no corresponde a este instalador.');
    }

    return true;
  }
}
